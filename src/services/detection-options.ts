import { z } from 'zod';

const threshold = z.number().finite().nonnegative();
const percentage = threshold.max(100);
const topN = z.number().int().positive();

export const DetectionOptionsSchema = z.object({
  /** Average run time, in minutes, above which a job is long-running. */
  longRunningMinutesThreshold: threshold,
  /** Failure rate above which a job is flagged. A 100% failure rate always is. */
  failureRateThreshold: threshold.max(1),
  topNLongRunning: topN,
  topNHighFailure: topN,
  underutilizedCpuPct: percentage,
  underutilizedMemoryPct: percentage,
  overutilizedCpuPct: percentage,
  overutilizedMemoryPct: percentage,
});

export type DetectionOptions = z.infer<typeof DetectionOptionsSchema>;

export const DEFAULT_DETECTION_OPTIONS: Readonly<DetectionOptions> = Object.freeze({
  longRunningMinutesThreshold: 120,
  failureRateThreshold: 0.5,
  topNLongRunning: 50,
  topNHighFailure: 50,
  underutilizedCpuPct: 20,
  underutilizedMemoryPct: 30,
  overutilizedCpuPct: 85,
  overutilizedMemoryPct: 90,
});

/** Raised for caller bugs (bad thresholds or limits) before any aggregation work. */
export class InvalidConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid detection configuration:\n${issues.map((i) => `  ${i}`).join('\n')}`);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Fill unset options from `defaults` and validate the result.
 * Keys explicitly set to `undefined` fall back to the default as well.
 */
export function resolveDetectionOptions(
  options: Partial<DetectionOptions> = {},
  defaults: Readonly<DetectionOptions> = DEFAULT_DETECTION_OPTIONS,
): DetectionOptions {
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = DetectionOptionsSchema.strict().safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((i) => `${i.path.join('.') || '(options)'}: ${i.message}`),
    );
  }
  return result.data;
}
