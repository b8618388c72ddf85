import type { PriorityConfiguration } from '../types.js';

/**
 * Request patterns kept warm, most popular first
 */
export const DEFAULT_PRIORITY_CONFIGS: readonly PriorityConfiguration[] = [
  // IIT JEE
  { subject: 'Mathematics', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' },
  { subject: 'Physics', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' },
  { subject: 'Chemistry', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' },
  { subject: 'Mathematics', difficulty: 'Hard', count: 30, examType: 'IIT_JEE' },
  { subject: 'Physics', difficulty: 'Hard', count: 30, examType: 'IIT_JEE' },

  // NEET
  { subject: 'Physics', difficulty: 'Medium', count: 45, examType: 'NEET' },
  { subject: 'Chemistry', difficulty: 'Medium', count: 45, examType: 'NEET' },
  { subject: 'Biology', difficulty: 'Medium', count: 45, examType: 'NEET' },

  // Practice sets
  { subject: 'Mathematics', difficulty: 'Easy', count: 10, examType: 'IIT_JEE' },
  { subject: 'Physics', difficulty: 'Easy', count: 10, examType: 'IIT_JEE' },
];

/**
 * Extra practice sets predicted on weekends
 */
export const WEEKEND_PRACTICE_CONFIGS: readonly PriorityConfiguration[] = [
  { subject: 'Mathematics', difficulty: 'Easy', count: 10, examType: 'IIT_JEE' },
  { subject: 'Physics', difficulty: 'Easy', count: 10, examType: 'IIT_JEE' },
  { subject: 'Chemistry', difficulty: 'Easy', count: 10, examType: 'IIT_JEE' },
];
