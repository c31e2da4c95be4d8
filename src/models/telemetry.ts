import { z } from 'zod';

export const RUN_STATUSES = ['succeeded', 'failed', 'other'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

const SUCCEEDED_STATES = new Set(['succeeded', 'success']);
// Timeouts and cancellations count against the job, as in the run timeline's
// failure analysis.
const FAILED_STATES = new Set([
  'failed',
  'failure',
  'error',
  'timeout',
  'timedout',
  'timed_out',
  'cancelled',
  'canceled',
]);

export function toRunStatus(raw: string | null | undefined): RunStatus {
  if (!raw) return 'other';
  const state = raw.trim().toLowerCase();
  if (SUCCEEDED_STATES.has(state)) return 'succeeded';
  if (FAILED_STATES.has(state)) return 'failed';
  return 'other';
}

/** Epoch milliseconds, or null when the value is absent or unparseable. */
export function parseTimestamp(value: unknown): number | null {
  let ms: number;
  if (value instanceof Date) ms = value.getTime();
  else if (typeof value === 'number') ms = value;
  else if (typeof value === 'string' && value.trim() !== '') ms = Date.parse(value);
  else return null;
  return Number.isFinite(ms) ? ms : null;
}

function parseFlag(value: boolean | number | string | null | undefined): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    return v === 'true' || v === '1' || v === 'yes';
  }
  return false;
}

/**
 * Opaque identifier; warehouse drivers hand these back as strings or integers.
 * Integers past 2^53 have already lost digits, so ids that large must arrive
 * as strings.
 */
export const IdentifierSchema = z
  .union([z.string().trim().min(1), z.number().int().safe()])
  .transform((v) => String(v));

/** Non-negative measurement. Decimal columns often arrive as numeric strings. */
export const MeasurementSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite().nonnegative());

/** Measurement that may be missing; an empty cell counts as missing, not zero. */
export const OptionalMeasurementSchema = z
  .preprocess((v) => (v === '' ? null : v), MeasurementSchema.nullish())
  .transform((v) => v ?? null);

// A name the row cannot supply becomes null; the run still counts.
const NameSchema = z.unknown().transform((v) => {
  if (typeof v !== 'string' && typeof v !== 'number') return null;
  const name = String(v).trim();
  return name === '' ? null : name;
});

export const JobRunRecordSchema = z.object({
  workspace_id: IdentifierSchema,
  job_id: IdentifierSchema,
  job_name: NameSchema,
  duration_seconds: MeasurementSchema,
  status: z.unknown().transform((v) => toRunStatus(typeof v === 'string' ? v : null)),
  start_time: z.unknown().transform(parseTimestamp),
});

export const ClusterSampleSchema = z.object({
  cluster_id: IdentifierSchema,
  is_driver: z.union([z.boolean(), z.number(), z.string()]).nullish().transform(parseFlag),
  cpu_utilization_pct: OptionalMeasurementSchema,
  cpu_wait_pct: OptionalMeasurementSchema,
  memory_utilization_pct: OptionalMeasurementSchema,
  network_received_mb: OptionalMeasurementSchema,
  network_sent_mb: OptionalMeasurementSchema,
});

export type JobRunRecord = z.infer<typeof JobRunRecordSchema>;
export type ClusterSample = z.infer<typeof ClusterSampleSchema>;

export type ClusterMeasurement = Exclude<keyof ClusterSample, 'cluster_id' | 'is_driver'>;

export const CLUSTER_MEASUREMENTS: readonly ClusterMeasurement[] = [
  'cpu_utilization_pct',
  'cpu_wait_pct',
  'memory_utilization_pct',
  'network_received_mb',
  'network_sent_mb',
];
