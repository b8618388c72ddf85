/**
 * Pre-generation Module
 *
 * Background filling of the question cache.
 */

export { PreGenerationAgent } from './PreGenerationAgent.js';
export type { PreGenerationAgentDeps } from './PreGenerationAgent.js';
export { DemandTracker } from './DemandTracker.js';
export { FillQueue } from './FillQueue.js';
export type { FillQueueOptions } from './FillQueue.js';
export { DEFAULT_PRIORITY_CONFIGS, WEEKEND_PRACTICE_CONFIGS } from './priorities.js';
export {
  DEFAULT_PEAK_WINDOWS,
  OFF_PEAK_DIFFICULTY,
  dedupeByCacheKey,
  isPeakHour,
  isWeekend,
  predictNextRequests,
  relatedDifficulties,
  weekdayOf,
} from './predictor.js';
export type {
  FillOutcome,
  MonitorOutcome,
  PeakWindow,
  PregenerationConfig,
  PregenerationReport,
  ScheduleOptions,
} from './types.js';
