import type {
  AnomalyCategory,
  AnomalyFinding,
  ClusterAnomalies,
  ClusterAnomalyCategory,
  ClusterFinding,
  ClusterMetrics,
  JobAnomalies,
  JobMetrics,
} from '../models/metrics.js';
import { resolveDetectionOptions, type DetectionOptions } from './detection-options.js';
import { jobKey } from './job-runtime-aggregator.js';

interface Candidate {
  job: JobMetrics;
  key: string;
  value: number;
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Metric desc, then run count desc (more runs is more significant), then key
// so the ordering never depends on input order.
function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.value - a.value ||
    b.job.total_runs - a.job.total_runs ||
    compareKeys(a.key, b.key)
  );
}

function rankJobs(
  category: AnomalyCategory,
  candidates: Candidate[],
  threshold: number,
  limit: number,
): AnomalyFinding[] {
  return candidates
    .sort(compareCandidates)
    .slice(0, limit)
    .map(({ job, value }, i) => ({
      category,
      job: { workspace_id: job.workspace_id, job_id: job.job_id, job_name: job.job_name },
      metric_value: value,
      rank: i + 1,
      threshold,
      total_runs: job.total_runs,
      failed_runs: job.failed_runs,
    }));
}

/**
 * Flag long-running and frequently failing jobs.
 *
 * Both rules are strict greater-than comparisons, except that a job failing
 * every run is always reported. Options are validated before any job is
 * looked at, so a bad configuration fails even on an empty window.
 */
export function detectJobAnomalies(
  jobs: Iterable<JobMetrics>,
  options: Partial<DetectionOptions> = {},
): JobAnomalies {
  const {
    longRunningMinutesThreshold,
    failureRateThreshold,
    topNLongRunning,
    topNHighFailure,
  } = resolveDetectionOptions(options);

  const longRunning: Candidate[] = [];
  const highFailure: Candidate[] = [];

  for (const job of jobs) {
    const key = jobKey(job.workspace_id, job.job_id);
    const avgMinutes = job.avg_duration / 60;
    if (avgMinutes > longRunningMinutesThreshold) {
      longRunning.push({ job, key, value: avgMinutes });
    }
    if (job.failure_rate > failureRateThreshold || job.failure_rate === 1) {
      highFailure.push({ job, key, value: job.failure_rate });
    }
  }

  return {
    long_running: rankJobs('long_running', longRunning, longRunningMinutesThreshold, topNLongRunning),
    high_failure_rate: rankJobs('high_failure_rate', highFailure, failureRateThreshold, topNHighFailure),
  };
}

function rankClusters(
  category: ClusterAnomalyCategory,
  clusters: ClusterMetrics[],
  compare: (a: ClusterMetrics, b: ClusterMetrics) => number,
): ClusterFinding[] {
  return clusters
    .sort((a, b) => compare(a, b) || compareKeys(a.cluster_id, b.cluster_id))
    .map((cluster, i) => ({
      category,
      cluster_id: cluster.cluster_id,
      is_driver: cluster.is_driver,
      avg_cpu_utilization: cluster.avg_cpu_utilization,
      avg_memory_utilization: cluster.avg_memory_utilization,
      low_cpu_percent: cluster.low_cpu_percent,
      low_memory_percent: cluster.low_memory_percent,
      rank: i + 1,
    }));
}

/**
 * Flag clusters whose average CPU and memory both sit below the idle band, or
 * whose average CPU or memory sits above the saturation band. A cluster with
 * an unknown average is never judged on that metric.
 *
 * `inefficient` lists the clusters the aggregator graded `underutilized`,
 * most often-idle first. It uses the fixed efficiency bands, not the options.
 */
export function detectClusterAnomalies(
  clusters: Iterable<ClusterMetrics>,
  options: Partial<DetectionOptions> = {},
): ClusterAnomalies {
  const {
    underutilizedCpuPct,
    underutilizedMemoryPct,
    overutilizedCpuPct,
    overutilizedMemoryPct,
  } = resolveDetectionOptions(options);

  const under: ClusterMetrics[] = [];
  const over: ClusterMetrics[] = [];
  const inefficient: ClusterMetrics[] = [];

  for (const cluster of clusters) {
    const cpu = cluster.avg_cpu_utilization;
    const memory = cluster.avg_memory_utilization;

    if (cpu !== null && memory !== null && cpu < underutilizedCpuPct && memory < underutilizedMemoryPct) {
      under.push(cluster);
    }
    if ((cpu !== null && cpu > overutilizedCpuPct) || (memory !== null && memory > overutilizedMemoryPct)) {
      over.push(cluster);
    }
    if (cluster.efficiency_category === 'underutilized') {
      inefficient.push(cluster);
    }
  }

  return {
    // Idlest first
    underutilized: rankClusters('underutilized', under, (a, b) =>
      (a.avg_cpu_utilization ?? 0) - (b.avg_cpu_utilization ?? 0)),
    // Busiest CPU first, unknown CPU last
    overutilized: rankClusters('overutilized', over, (a, b) =>
      (b.avg_cpu_utilization ?? -1) - (a.avg_cpu_utilization ?? -1)),
    inefficient: rankClusters('inefficient', inefficient, (a, b) =>
      b.low_cpu_percent - a.low_cpu_percent || b.low_memory_percent - a.low_memory_percent),
  };
}
