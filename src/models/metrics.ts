import { z } from 'zod';

const rate = z.number().min(0).max(1);
const pct = z.number().min(0).max(100);
const nullableStat = z.number().nullable();

export const EfficiencyCategorySchema = z.enum(['underutilized', 'high_utilization', 'normal']);

/** Durations are in seconds. */
export const JobMetricsSchema = z.object({
  workspace_id: z.string(),
  job_id: z.string(),
  job_name: z.string().nullable(),
  total_runs: z.number().int().min(1),
  successful_runs: z.number().int().min(0),
  failed_runs: z.number().int().min(0),
  other_runs: z.number().int().min(0),
  failure_rate: rate,
  success_rate: rate,
  avg_duration: z.number(),
  min_duration: z.number(),
  max_duration: z.number(),
  median_duration: z.number(),
  p90_duration: z.number(),
  p95_duration: z.number(),
  p99_duration: z.number(),
});

export const ClusterMetricsSchema = z.object({
  cluster_id: z.string(),
  is_driver: z.boolean(),
  data_points: z.number().int().min(1),
  avg_cpu_utilization: nullableStat,
  peak_cpu_utilization: nullableStat,
  min_cpu_utilization: nullableStat,
  avg_cpu_wait: nullableStat,
  max_cpu_wait: nullableStat,
  avg_memory_utilization: nullableStat,
  max_memory_utilization: nullableStat,
  min_memory_utilization: nullableStat,
  avg_network_received_mb: nullableStat,
  avg_network_sent_mb: nullableStat,
  // Share of all samples with a CPU or memory reading under the low-sample bands
  low_cpu_percent: pct,
  low_memory_percent: pct,
  efficiency_category: EfficiencyCategorySchema,
});

export const JobIdentitySchema = z.object({
  workspace_id: z.string(),
  job_id: z.string(),
  job_name: z.string().nullable(),
});

export const AnomalyCategorySchema = z.enum(['long_running', 'high_failure_rate']);

export const AnomalyFindingSchema = z.object({
  category: AnomalyCategorySchema,
  job: JobIdentitySchema,
  // Average duration in minutes for long_running, failure rate for high_failure_rate
  metric_value: z.number(),
  rank: z.number().int().min(1),
  threshold: z.number(),
  total_runs: z.number().int().min(1),
  failed_runs: z.number().int().min(0),
});

export const ClusterAnomalyCategorySchema = z.enum(['underutilized', 'overutilized', 'inefficient']);

export const ClusterFindingSchema = z.object({
  category: ClusterAnomalyCategorySchema,
  cluster_id: z.string(),
  is_driver: z.boolean(),
  avg_cpu_utilization: nullableStat,
  avg_memory_utilization: nullableStat,
  low_cpu_percent: pct,
  low_memory_percent: pct,
  rank: z.number().int().min(1),
});

export type JobMetrics = z.infer<typeof JobMetricsSchema>;
export type EfficiencyCategory = z.infer<typeof EfficiencyCategorySchema>;
export type ClusterMetrics = z.infer<typeof ClusterMetricsSchema>;
export type JobIdentity = z.infer<typeof JobIdentitySchema>;
export type AnomalyCategory = z.infer<typeof AnomalyCategorySchema>;
export type AnomalyFinding = z.infer<typeof AnomalyFindingSchema>;
export type ClusterAnomalyCategory = z.infer<typeof ClusterAnomalyCategorySchema>;
export type ClusterFinding = z.infer<typeof ClusterFindingSchema>;

export interface JobAnomalies {
  long_running: AnomalyFinding[];
  high_failure_rate: AnomalyFinding[];
}

export interface ClusterAnomalies {
  underutilized: ClusterFinding[];
  overutilized: ClusterFinding[];
  inefficient: ClusterFinding[];
}
