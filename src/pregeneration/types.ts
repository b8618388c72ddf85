/**
 * Pre-generation Type Definitions
 */

/**
 * Hour window (inclusive on both ends, 0-23) treated as peak study time
 */
export interface PeakWindow {
  startHour: number;
  endHour: number;
}

/**
 * Tuning for the pre-generation agent
 */
export interface PregenerationConfig {
  /** Configurations filled concurrently per batch (default: 3) */
  batchSize: number;
  /** Pause between batches in ms (default: 2000) */
  batchDelayMs: number;
  /** Batch size used when the hit rate is low (default: 5) */
  escalatedBatchSize: number;
  /** Pause between batches when the hit rate is low (default: 1000) */
  escalatedBatchDelayMs: number;
  /** Priority configurations filled at startup (default: 5) */
  warmupCount: number;
  /** Batch size for the startup warm-up (default: 2) */
  warmupBatchSize: number;
  /** Peak study windows (default: 6-9, 14-17, 19-23) */
  peakWindows: PeakWindow[];
  /** Hit rate percentage below which pre-generation escalates (default: 70) */
  escalateBelowHitRate: number;
  /** Hit rate percentage above which the warm set is left alone (default: 90) */
  maintainAboveHitRate: number;
  /** Most-missed configurations added ahead of the priority list when escalating (default: 10) */
  adaptiveLimit: number;
}

export type FillOutcome = 'generated' | 'skipped' | 'failed';

/**
 * Outcome of one scheduling call
 */
export interface PregenerationReport {
  /** Distinct configurations after de-duplication */
  requested: number;
  generated: number;
  skipped: number;
  failed: number;
  /** Batches whose fan-out fully settled */
  batches: number;
  /** True when the abort signal ended the run early */
  cancelled: boolean;
}

export interface ScheduleOptions {
  batchSize?: number;
  batchDelayMs?: number;
  signal?: AbortSignal;
}

export type MonitorOutcome =
  | { action: 'disabled' }
  | { action: 'escalated'; hitRate: number; report: PregenerationReport }
  | { action: 'maintained'; hitRate: number }
  | { action: 'steady'; hitRate: number };
