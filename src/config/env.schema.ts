import { z } from 'zod';

const percentage = z.coerce.number().min(0).max(100);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Job anomaly detection
  LONG_RUNNING_MINUTES_THRESHOLD: z.coerce.number().min(0).default(120),
  FAILURE_RATE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  TOP_N_LONG_RUNNING: z.coerce.number().int().min(1).default(50),
  TOP_N_HIGH_FAILURE: z.coerce.number().int().min(1).default(50),

  // Cluster utilization bands (percent of CPU / memory)
  CLUSTER_UNDERUTILIZED_CPU_PCT: percentage.default(20),
  CLUSTER_UNDERUTILIZED_MEMORY_PCT: percentage.default(30),
  CLUSTER_OVERUTILIZED_CPU_PCT: percentage.default(85),
  CLUSTER_OVERUTILIZED_MEMORY_PCT: percentage.default(90),
});

export type EnvConfig = z.infer<typeof envSchema>;
