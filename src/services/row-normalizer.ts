import type { z } from 'zod';
import {
  ClusterSampleSchema,
  JobRunRecordSchema,
  type ClusterSample,
  type JobRunRecord,
} from '../models/telemetry.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('row-normalizer');

/** Only the first issues are kept; `skipped` still counts every rejected row. */
export const MAX_RECORDED_ISSUES = 100;

/** A raw row that failed validation and was left out of the batch. */
export interface MalformedRecord {
  index: number;
  field: string;
  message: string;
}

export interface NormalizationResult<T> {
  records: T[];
  total: number;
  accepted: number;
  skipped: number;
  issues: MalformedRecord[];
}

function normalizeRows<S extends z.ZodTypeAny>(
  kind: string,
  schema: S,
  rows: readonly unknown[],
): NormalizationResult<z.output<S>> {
  const records: z.output<S>[] = [];
  const issues: MalformedRecord[] = [];
  let skipped = 0;

  rows.forEach((row, index) => {
    const result = schema.safeParse(row);
    if (result.success) {
      records.push(result.data);
      return;
    }

    skipped++;
    const issue = result.error.issues[0];
    const malformed: MalformedRecord = {
      index,
      field: issue && issue.path.length > 0 ? issue.path.join('.') : '(row)',
      message: issue?.message ?? 'Invalid row',
    };
    log.debug({ kind, ...malformed }, 'Skipping malformed row');
    if (issues.length < MAX_RECORDED_ISSUES) issues.push(malformed);
  });

  if (skipped > 0) {
    log.warn({ kind, total: rows.length, skipped }, 'Malformed telemetry rows skipped');
  }

  return {
    records,
    total: rows.length,
    accepted: records.length,
    skipped,
    issues,
  };
}

export function normalizeJobRuns(rows: readonly unknown[]): NormalizationResult<JobRunRecord> {
  return normalizeRows('job_run', JobRunRecordSchema, rows);
}

export function normalizeClusterSamples(
  rows: readonly unknown[],
): NormalizationResult<ClusterSample> {
  return normalizeRows('cluster_sample', ClusterSampleSchema, rows);
}
