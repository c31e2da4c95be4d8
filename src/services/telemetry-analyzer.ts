import { getConfig } from '../config/index.js';
import type {
  ClusterAnomalies,
  ClusterMetrics,
  JobAnomalies,
  JobMetrics,
} from '../models/metrics.js';
import { createChildLogger } from '../utils/logger.js';
import { classifyAlerts, type AlertsBySeverity } from './alert-classifier.js';
import { detectClusterAnomalies, detectJobAnomalies } from './anomaly-detector.js';
import { aggregateClusterSamples } from './cluster-utilization-aggregator.js';
import { resolveDetectionOptions, type DetectionOptions } from './detection-options.js';
import { aggregateJobRuns } from './job-runtime-aggregator.js';
import {
  normalizeClusterSamples,
  normalizeJobRuns,
  type NormalizationResult,
} from './row-normalizer.js';
import { summarizeWindow, type WindowSummary } from './window-summary.js';

const log = createChildLogger('telemetry-analyzer');

/** Rows for one analysis window, already fetched and filtered by the caller. */
export interface TelemetryWindow {
  jobRuns?: readonly unknown[];
  clusterSamples?: readonly unknown[];
}

export type DataQualityReport = Omit<NormalizationResult<unknown>, 'records'>;

export interface TelemetryAnalysis {
  options: DetectionOptions;
  /** Sorted by workspace and job id. */
  job_metrics: JobMetrics[];
  /** Sorted by cluster id. */
  cluster_metrics: ClusterMetrics[];
  anomalies: JobAnomalies;
  cluster_anomalies: ClusterAnomalies;
  summary: WindowSummary;
  alerts: AlertsBySeverity;
  data_quality: {
    job_runs: DataQualityReport;
    cluster_samples: DataQualityReport;
  };
}

/** Detection defaults taken from the environment. */
export function detectionDefaultsFromConfig(): DetectionOptions {
  const config = getConfig();
  return {
    longRunningMinutesThreshold: config.LONG_RUNNING_MINUTES_THRESHOLD,
    failureRateThreshold: config.FAILURE_RATE_THRESHOLD,
    topNLongRunning: config.TOP_N_LONG_RUNNING,
    topNHighFailure: config.TOP_N_HIGH_FAILURE,
    underutilizedCpuPct: config.CLUSTER_UNDERUTILIZED_CPU_PCT,
    underutilizedMemoryPct: config.CLUSTER_UNDERUTILIZED_MEMORY_PCT,
    overutilizedCpuPct: config.CLUSTER_OVERUTILIZED_CPU_PCT,
    overutilizedMemoryPct: config.CLUSTER_OVERUTILIZED_MEMORY_PCT,
  };
}

function sortedValues<T>(map: Map<string, T>): T[] {
  return [...map.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, value]) => value);
}

function qualityOf<T>(result: NormalizationResult<T>): DataQualityReport {
  const { total, accepted, skipped, issues } = result;
  return { total, accepted, skipped, issues };
}

/**
 * Run one window through normalization, aggregation and anomaly detection.
 *
 * Options are resolved over the environment defaults and validated before any
 * row is read; an invalid configuration throws `InvalidConfigurationError`.
 * Malformed rows are skipped and reported under `data_quality`.
 */
export function analyzeTelemetryWindow(
  window: TelemetryWindow,
  options: Partial<DetectionOptions> = {},
): TelemetryAnalysis {
  const resolved = resolveDetectionOptions(options, detectionDefaultsFromConfig());

  const jobRuns = normalizeJobRuns(window.jobRuns ?? []);
  const clusterSamples = normalizeClusterSamples(window.clusterSamples ?? []);

  const jobMetrics = sortedValues(aggregateJobRuns(jobRuns.records));
  const clusterMetrics = sortedValues(aggregateClusterSamples(clusterSamples.records));

  const anomalies = detectJobAnomalies(jobMetrics, resolved);
  const clusterAnomalies = detectClusterAnomalies(clusterMetrics, resolved);

  const summary = summarizeWindow(jobMetrics, clusterMetrics);

  log.info(
    {
      jobs: jobMetrics.length,
      clusters: clusterMetrics.length,
      longRunning: anomalies.long_running.length,
      highFailureRate: anomalies.high_failure_rate.length,
      skippedRows: jobRuns.skipped + clusterSamples.skipped,
      health: summary.overall_health,
    },
    'Telemetry window analyzed',
  );

  return {
    options: resolved,
    job_metrics: jobMetrics,
    cluster_metrics: clusterMetrics,
    anomalies,
    cluster_anomalies: clusterAnomalies,
    summary,
    alerts: classifyAlerts(anomalies, clusterAnomalies),
    data_quality: {
      job_runs: qualityOf(jobRuns),
      cluster_samples: qualityOf(clusterSamples),
    },
  };
}
