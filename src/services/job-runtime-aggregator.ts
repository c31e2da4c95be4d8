import type { JobMetrics } from '../models/metrics.js';
import type { JobRunRecord } from '../models/telemetry.js';
import { mean, percentile, safeDivide, sortAscending } from './statistics.js';

/** Map key for a (workspace_id, job_id) identity. Both parts are encoded so the key is unambiguous. */
export function jobKey(workspaceId: string, jobId: string): string {
  return `${encodeURIComponent(workspaceId)}:${encodeURIComponent(jobId)}`;
}

interface NameCandidate {
  name: string;
  startTime: number | null;
  seq: number;
}

// Latest start time wins; undated runs rank below dated ones; equal start
// times fall back to input order (last seen wins).
function newerName(a: NameCandidate | null, b: NameCandidate | null): NameCandidate | null {
  if (!a) return b;
  if (!b) return a;
  const aTime = a.startTime ?? Number.NEGATIVE_INFINITY;
  const bTime = b.startTime ?? Number.NEGATIVE_INFINITY;
  if (aTime !== bTime) return aTime > bTime ? a : b;
  return a.seq >= b.seq ? a : b;
}

/**
 * Running state for one job identity. Accumulators for the same identity built
 * over disjoint partitions of the input can be merged before finalizing.
 */
export class JobRunAccumulator {
  private readonly durations: number[] = [];
  private succeeded = 0;
  private failed = 0;
  private other = 0;
  private name: NameCandidate | null = null;

  constructor(
    readonly workspaceId: string,
    readonly jobId: string,
  ) {}

  /** `seq` is the record's position in the overall input. */
  add(record: JobRunRecord, seq: number): void {
    this.durations.push(record.duration_seconds);
    if (record.status === 'succeeded') this.succeeded++;
    else if (record.status === 'failed') this.failed++;
    else this.other++;

    if (record.job_name !== null) {
      this.name = newerName(this.name, { name: record.job_name, startTime: record.start_time, seq });
    }
  }

  merge(other: JobRunAccumulator): void {
    if (other.workspaceId !== this.workspaceId || other.jobId !== this.jobId) {
      throw new Error(
        `Cannot merge job ${jobKey(other.workspaceId, other.jobId)} into ${jobKey(this.workspaceId, this.jobId)}`,
      );
    }
    this.durations.push(...other.durations);
    this.succeeded += other.succeeded;
    this.failed += other.failed;
    this.other += other.other;
    this.name = newerName(this.name, other.name);
  }

  /** Returns null when no run was added, so empty groups are never emitted. */
  finalize(): JobMetrics | null {
    const total = this.durations.length;
    if (total === 0) return null;

    const sorted = sortAscending(this.durations);
    return {
      workspace_id: this.workspaceId,
      job_id: this.jobId,
      job_name: this.name?.name ?? null,
      total_runs: total,
      successful_runs: this.succeeded,
      failed_runs: this.failed,
      other_runs: this.other,
      failure_rate: safeDivide(this.failed, total),
      success_rate: safeDivide(this.succeeded, total),
      avg_duration: mean(sorted),
      min_duration: sorted[0],
      max_duration: sorted[total - 1],
      median_duration: percentile(sorted, 50),
      p90_duration: percentile(sorted, 90),
      p95_duration: percentile(sorted, 95),
      p99_duration: percentile(sorted, 99),
    };
  }
}

/**
 * Group runs by identity. `offset` is the position of `records[0]` in the
 * overall input when aggregating one partition of a larger batch.
 */
export function accumulateJobRuns(
  records: readonly JobRunRecord[],
  offset = 0,
): Map<string, JobRunAccumulator> {
  const groups = new Map<string, JobRunAccumulator>();
  records.forEach((record, i) => {
    const key = jobKey(record.workspace_id, record.job_id);
    let acc = groups.get(key);
    if (!acc) {
      acc = new JobRunAccumulator(record.workspace_id, record.job_id);
      groups.set(key, acc);
    }
    acc.add(record, offset + i);
  });
  return groups;
}

/** Merge per-partition accumulators into one map. */
export function mergeJobAccumulators(
  partitions: Iterable<Map<string, JobRunAccumulator>>,
): Map<string, JobRunAccumulator> {
  const merged = new Map<string, JobRunAccumulator>();
  for (const partition of partitions) {
    for (const [key, acc] of partition) {
      let target = merged.get(key);
      if (!target) {
        target = new JobRunAccumulator(acc.workspaceId, acc.jobId);
        merged.set(key, target);
      }
      target.merge(acc);
    }
  }
  return merged;
}

export function finalizeJobAccumulators(
  groups: Map<string, JobRunAccumulator>,
): Map<string, JobMetrics> {
  const metrics = new Map<string, JobMetrics>();
  for (const [key, acc] of groups) {
    const result = acc.finalize();
    if (result) metrics.set(key, result);
  }
  return metrics;
}

/** Per-job runtime and outcome statistics keyed by `jobKey`. */
export function aggregateJobRuns(records: readonly JobRunRecord[]): Map<string, JobMetrics> {
  return finalizeJobAccumulators(accumulateJobRuns(records));
}
