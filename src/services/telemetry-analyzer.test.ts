import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockConfig = vi.hoisted(() => ({
  LONG_RUNNING_MINUTES_THRESHOLD: 120,
  FAILURE_RATE_THRESHOLD: 0.5,
  TOP_N_LONG_RUNNING: 50,
  TOP_N_HIGH_FAILURE: 50,
  CLUSTER_UNDERUTILIZED_CPU_PCT: 20,
  CLUSTER_UNDERUTILIZED_MEMORY_PCT: 30,
  CLUSTER_OVERUTILIZED_CPU_PCT: 85,
  CLUSTER_OVERUTILIZED_MEMORY_PCT: 90,
}));

const mockLog = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../config/index.js', () => ({
  getConfig: () => mockConfig,
}));

vi.mock('../utils/logger.js', () => ({
  createChildLogger: () => mockLog,
}));

import { analyzeTelemetryWindow, detectionDefaultsFromConfig } from './telemetry-analyzer.js';
import { InvalidConfigurationError } from './detection-options.js';

const jobRuns = [
  { workspace_id: 1, job_id: 42, job_name: 'etl', duration_seconds: 100, status: 'succeeded' },
  { workspace_id: 1, job_id: 42, job_name: 'etl', duration_seconds: 200, status: 'succeeded' },
  { workspace_id: 1, job_id: 42, job_name: 'etl', duration_seconds: 300, status: 'succeeded' },
  { workspace_id: 1, job_id: 7, job_name: 'flaky', duration_seconds: 50, status: 'succeeded' },
  { workspace_id: 1, job_id: 7, job_name: 'flaky', duration_seconds: 9999, status: 'failed' },
];

const clusterSamples = [
  { cluster_id: 'c-b', is_driver: true, cpu_utilization_pct: 95, memory_utilization_pct: 40 },
  { cluster_id: 'c-a', is_driver: false, cpu_utilization_pct: 5, memory_utilization_pct: 10 },
  { cluster_id: 'c-a', is_driver: false, cpu_utilization_pct: 15, memory_utilization_pct: 20 },
];

describe('telemetry-analyzer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('aggregates the window into sorted job and cluster tables', () => {
    const result = analyzeTelemetryWindow({ jobRuns, clusterSamples });

    expect(result.job_metrics.map((j) => j.job_id)).toEqual(['42', '7']);
    expect(result.job_metrics[0]).toMatchObject({
      workspace_id: '1',
      job_id: '42',
      job_name: 'etl',
      total_runs: 3,
      avg_duration: 200,
      min_duration: 100,
      max_duration: 300,
      median_duration: 200,
      failure_rate: 0,
    });
    expect(result.cluster_metrics.map((c) => [c.cluster_id, c.avg_cpu_utilization])).toEqual([
      ['c-a', 10],
      ['c-b', 95],
    ]);
  });

  it('flags the half-failing job above a 0.4 failure threshold', () => {
    const result = analyzeTelemetryWindow(
      { jobRuns },
      { failureRateThreshold: 0.4, longRunningMinutesThreshold: 100 },
    );

    expect(result.anomalies.high_failure_rate.map((f) => [f.job.job_id, f.metric_value])).toEqual([
      ['7', 0.5],
    ]);
    expect(result.anomalies.long_running).toEqual([]);
  });

  it('flags the job averaging about 84 minutes only when the threshold is below it', () => {
    const at50 = analyzeTelemetryWindow({ jobRuns }, { longRunningMinutesThreshold: 50 });
    const at100 = analyzeTelemetryWindow({ jobRuns }, { longRunningMinutesThreshold: 100 });

    expect(at50.anomalies.long_running.map((f) => f.job.job_id)).toEqual(['7']);
    expect(at100.anomalies.long_running).toEqual([]);
  });

  it('classifies job and cluster findings into alerts', () => {
    const result = analyzeTelemetryWindow({ jobRuns, clusterSamples }, { longRunningMinutesThreshold: 50 });

    expect(result.cluster_anomalies.overutilized.map((c) => c.cluster_id)).toEqual(['c-b']);
    expect(result.cluster_anomalies.underutilized.map((c) => c.cluster_id)).toEqual(['c-a']);
    expect(result.alerts.critical.map((a) => a.subject)).toEqual(['c-b']);
    expect(result.alerts.warning.map((a) => a.subject)).toEqual(['flaky', 'c-a']);
    // c-a averages 10% CPU and 15% memory; one of its two samples is under 10% CPU
    expect(result.cluster_anomalies.inefficient.map((c) => [c.cluster_id, c.low_cpu_percent, c.low_memory_percent])).toEqual([
      ['c-a', 50, 50],
    ]);
    expect(result.alerts.info.map((a) => a.subject)).toEqual(['c-a']);
  });

  it('takes default thresholds from the environment config', () => {
    expect(detectionDefaultsFromConfig()).toEqual({
      longRunningMinutesThreshold: 120,
      failureRateThreshold: 0.5,
      topNLongRunning: 50,
      topNHighFailure: 50,
      underutilizedCpuPct: 20,
      underutilizedMemoryPct: 30,
      overutilizedCpuPct: 85,
      overutilizedMemoryPct: 90,
    });

    const result = analyzeTelemetryWindow({ jobRuns }, { topNHighFailure: 3 });
    expect(result.options).toMatchObject({ failureRateThreshold: 0.5, topNHighFailure: 3 });
    // failure rate 0.5 does not exceed the default 0.5 threshold
    expect(result.anomalies.high_failure_rate).toEqual([]);
  });

  it('reports skipped rows without failing the window', () => {
    const result = analyzeTelemetryWindow({
      jobRuns: [...jobRuns, { workspace_id: 1, duration_seconds: 10 }],
      clusterSamples: [...clusterSamples, { cluster_id: 'c-c', cpu_utilization_pct: 'busy' }],
    });

    expect(result.data_quality.job_runs).toEqual({
      total: 6,
      accepted: 5,
      skipped: 1,
      issues: [{ index: 5, field: 'job_id', message: expect.any(String) }],
    });
    expect(result.data_quality.cluster_samples).toMatchObject({ total: 4, accepted: 3, skipped: 1 });
    expect(result.cluster_metrics.map((c) => c.cluster_id)).toEqual(['c-a', 'c-b']);
  });

  it('returns empty tables and lists for an empty window', () => {
    const result = analyzeTelemetryWindow({ jobRuns: [], clusterSamples: [] });

    expect(result.job_metrics).toEqual([]);
    expect(result.cluster_metrics).toEqual([]);
    expect(result.anomalies).toEqual({ long_running: [], high_failure_rate: [] });
    expect(result.cluster_anomalies).toEqual({ underutilized: [], overutilized: [], inefficient: [] });
    expect(result.summary.overall_health).toBe('unknown');
    expect(result.alerts).toEqual({ critical: [], warning: [], info: [] });
  });

  it('rejects invalid options before reading any rows', () => {
    expect(() => analyzeTelemetryWindow(
      { jobRuns: [{ job_id: null }] },
      { topNLongRunning: 0 },
    )).toThrow(InvalidConfigurationError);

    expect(mockLog.debug).not.toHaveBeenCalled();
    expect(mockLog.warn).not.toHaveBeenCalled();
    expect(mockLog.info).not.toHaveBeenCalled();
  });

  it('logs one summary line per window', () => {
    analyzeTelemetryWindow({ jobRuns });

    expect(mockLog.info).toHaveBeenCalledTimes(1);
    expect(mockLog.info).toHaveBeenCalledWith(
      expect.objectContaining({ jobs: 2, clusters: 0, skippedRows: 0 }),
      'Telemetry window analyzed',
    );
  });

  it('returns JSON-serializable output', () => {
    const result = analyzeTelemetryWindow({ jobRuns, clusterSamples });
    expect(JSON.parse(JSON.stringify(result))).toEqual(result);
  });
});
