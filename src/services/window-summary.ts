import type { ClusterMetrics, JobMetrics } from '../models/metrics.js';
import { mean, sortAscending } from './statistics.js';

export type OverallHealth = 'excellent' | 'good' | 'fair' | 'poor' | 'unknown';

export interface JobWindowStats {
  total_jobs: number;
  total_runs: number;
  total_failures: number;
  /** Mean of the per-job average durations. */
  avg_runtime_minutes: number;
  /** Mean of the per-job success rates, as a percentage. */
  avg_success_rate_pct: number;
}

export interface ClusterWindowStats {
  total_clusters: number;
  avg_cpu_utilization: number | null;
  avg_memory_utilization: number | null;
}

export interface WindowSummary {
  job_stats: JobWindowStats | null;
  cluster_stats: ClusterWindowStats | null;
  overall_health: OverallHealth;
}

function meanOrNull(values: Array<number | null>): number | null {
  const known = values.filter((v): v is number => v !== null);
  return known.length === 0 ? null : mean(sortAscending(known));
}

function scoreSuccessRate(pct: number): number {
  if (pct > 95) return 1;
  if (pct > 85) return 0.5;
  return 0;
}

function scoreCpu(pct: number): number {
  if (pct >= 20 && pct <= 80) return 1;
  if (pct >= 10 && pct <= 90) return 0.5;
  return 0;
}

export function assessOverallHealth(
  jobStats: JobWindowStats | null,
  clusterStats: ClusterWindowStats | null,
): OverallHealth {
  let score = 0;
  let parts = 0;

  if (jobStats) {
    parts++;
    score += scoreSuccessRate(jobStats.avg_success_rate_pct);
  }
  if (clusterStats && clusterStats.avg_cpu_utilization !== null) {
    parts++;
    score += scoreCpu(clusterStats.avg_cpu_utilization);
  }

  if (parts === 0) return 'unknown';

  const ratio = score / parts;
  if (ratio >= 0.8) return 'excellent';
  if (ratio >= 0.6) return 'good';
  if (ratio >= 0.4) return 'fair';
  return 'poor';
}

/** Window-level totals and a coarse health grade over the aggregated tables. */
export function summarizeWindow(
  jobs: readonly JobMetrics[],
  clusters: readonly ClusterMetrics[],
): WindowSummary {
  const jobStats: JobWindowStats | null = jobs.length === 0
    ? null
    : {
        total_jobs: jobs.length,
        total_runs: jobs.reduce((sum, j) => sum + j.total_runs, 0),
        total_failures: jobs.reduce((sum, j) => sum + j.failed_runs, 0),
        avg_runtime_minutes: mean(sortAscending(jobs.map((j) => j.avg_duration))) / 60,
        avg_success_rate_pct: mean(sortAscending(jobs.map((j) => j.success_rate))) * 100,
      };

  const clusterStats: ClusterWindowStats | null = clusters.length === 0
    ? null
    : {
        total_clusters: clusters.length,
        avg_cpu_utilization: meanOrNull(clusters.map((c) => c.avg_cpu_utilization)),
        avg_memory_utilization: meanOrNull(clusters.map((c) => c.avg_memory_utilization)),
      };

  return {
    job_stats: jobStats,
    cluster_stats: clusterStats,
    overall_health: assessOverallHealth(jobStats, clusterStats),
  };
}
