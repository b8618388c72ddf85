/**
 * Request prediction heuristics
 *
 * Pure functions of the clock reading and the static priority lists.
 */

import { deriveCacheKey } from '../cache/CacheKey.js';
import { DIFFICULTIES, type PriorityConfiguration, type QuestionRequest } from '../types.js';
import type { PeakWindow } from './types.js';
import { DEFAULT_PRIORITY_CONFIGS, WEEKEND_PRACTICE_CONFIGS } from './priorities.js';

export const DEFAULT_PEAK_WINDOWS: readonly PeakWindow[] = [
  { startHour: 6, endHour: 9 },
  { startHour: 14, endHour: 17 },
  { startHour: 19, endHour: 23 },
];

/** Difficulty tier kept warm outside peak hours */
export const OFF_PEAK_DIFFICULTY = 'Medium';

export interface PredictionInputs {
  priorities?: readonly PriorityConfiguration[];
  weekendPractice?: readonly PriorityConfiguration[];
  peakWindows?: readonly PeakWindow[];
}

export function isPeakHour(hour: number, windows: readonly PeakWindow[] = DEFAULT_PEAK_WINDOWS): boolean {
  return windows.some((window) => hour >= window.startHour && hour <= window.endHour);
}

/**
 * Day of week with Monday = 0 … Sunday = 6
 */
export function weekdayOf(date: Date): number {
  return (date.getDay() + 6) % 7;
}

export function isWeekend(weekday: number): boolean {
  return weekday >= 5;
}

/**
 * Drop configurations that map to an already-seen cache key, keeping order
 */
export function dedupeByCacheKey<T extends QuestionRequest>(configs: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const config of configs) {
    const key = deriveCacheKey(config);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(config);
    }
  }

  return unique;
}

/**
 * Predict the configurations likely to be requested next
 *
 * - Peak hours: the whole priority list
 * - Off-peak: only the Medium tier
 * - Weekends (weekday 5 or 6): plus the weekend practice sets
 *
 * @param hour - Hour of day (0-23)
 * @param weekday - Day of week (0 = Monday … 6 = Sunday)
 */
export function predictNextRequests(
  hour: number,
  weekday: number,
  inputs: PredictionInputs = {}
): PriorityConfiguration[] {
  const priorities = inputs.priorities ?? DEFAULT_PRIORITY_CONFIGS;
  const predictions: PriorityConfiguration[] = [];

  if (isPeakHour(hour, inputs.peakWindows)) {
    predictions.push(...priorities);
  } else {
    predictions.push(...priorities.filter((config) => config.difficulty === OFF_PEAK_DIFFICULTY));
  }

  if (isWeekend(weekday)) {
    predictions.push(...(inputs.weekendPractice ?? WEEKEND_PRACTICE_CONFIGS));
  }

  return dedupeByCacheKey(predictions);
}

/**
 * The same request at every other difficulty tier
 */
export function relatedDifficulties(request: QuestionRequest): QuestionRequest[] {
  const current = request.difficulty.trim().toLowerCase();
  return DIFFICULTIES
    .filter((difficulty) => difficulty.toLowerCase() !== current)
    .map((difficulty) => ({ ...request, difficulty }));
}
