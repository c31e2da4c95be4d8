// Public API of the telemetry analyzer.
// Callers that already hold a window of rows only need analyzeTelemetryWindow;
// the building blocks are exported for partitioned or incremental use.

// Pipeline
export type { TelemetryWindow, TelemetryAnalysis, DataQualityReport } from './services/telemetry-analyzer.js';
export { analyzeTelemetryWindow, detectionDefaultsFromConfig } from './services/telemetry-analyzer.js';

// Models
export type { RunStatus, JobRunRecord, ClusterSample, ClusterMeasurement } from './models/telemetry.js';
export {
  RUN_STATUSES,
  CLUSTER_MEASUREMENTS,
  toRunStatus,
  parseTimestamp,
  JobRunRecordSchema,
  ClusterSampleSchema,
} from './models/telemetry.js';

export type {
  JobMetrics,
  ClusterMetrics,
  EfficiencyCategory,
  JobIdentity,
  AnomalyCategory,
  AnomalyFinding,
  ClusterAnomalyCategory,
  ClusterFinding,
  JobAnomalies,
  ClusterAnomalies,
} from './models/metrics.js';
export {
  JobMetricsSchema,
  ClusterMetricsSchema,
  AnomalyFindingSchema,
  ClusterFindingSchema,
} from './models/metrics.js';

// Services: normalization
export type { MalformedRecord, NormalizationResult } from './services/row-normalizer.js';
export { normalizeJobRuns, normalizeClusterSamples, MAX_RECORDED_ISSUES } from './services/row-normalizer.js';
export { fromJobRunTimelineRow, fromNodeTimelineRow } from './services/system-table-rows.js';

// Services: aggregation
export {
  jobKey,
  JobRunAccumulator,
  accumulateJobRuns,
  mergeJobAccumulators,
  finalizeJobAccumulators,
  aggregateJobRuns,
} from './services/job-runtime-aggregator.js';
export {
  LOW_CPU_SAMPLE_PCT,
  LOW_MEMORY_SAMPLE_PCT,
  EFFICIENCY_BANDS,
  classifyEfficiency,
  ClusterSampleAccumulator,
  accumulateClusterSamples,
  mergeClusterAccumulators,
  finalizeClusterAccumulators,
  aggregateClusterSamples,
} from './services/cluster-utilization-aggregator.js';

export type { NumericSummary } from './services/statistics.js';
export { mean, percentile, sortAscending, summarize } from './services/statistics.js';

// Services: detection and reporting
export type { DetectionOptions } from './services/detection-options.js';
export {
  DEFAULT_DETECTION_OPTIONS,
  InvalidConfigurationError,
  resolveDetectionOptions,
} from './services/detection-options.js';
export { detectJobAnomalies, detectClusterAnomalies } from './services/anomaly-detector.js';

export type { OverallHealth, JobWindowStats, ClusterWindowStats, WindowSummary } from './services/window-summary.js';
export { assessOverallHealth, summarizeWindow } from './services/window-summary.js';

export type { Alert, AlertSeverity, AlertsBySeverity } from './services/alert-classifier.js';
export { classifyAlerts } from './services/alert-classifier.js';

// Config
export type { EnvConfig } from './config/index.js';
export { getConfig } from './config/index.js';
