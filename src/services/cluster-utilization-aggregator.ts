import type { ClusterMetrics, EfficiencyCategory } from '../models/metrics.js';
import {
  CLUSTER_MEASUREMENTS,
  type ClusterMeasurement,
  type ClusterSample,
} from '../models/telemetry.js';
import { safeDivide, sortAscending, summarize, type NumericSummary } from './statistics.js';

/** A sample below these readings counts towards `low_cpu_percent` / `low_memory_percent`. */
export const LOW_CPU_SAMPLE_PCT = 10;
export const LOW_MEMORY_SAMPLE_PCT = 20;

/**
 * Efficiency bands over the cluster averages. Idle needs both averages under
 * their band; busy needs either one over. An unknown average satisfies
 * neither side.
 */
export const EFFICIENCY_BANDS = Object.freeze({
  idleCpuPct: 20,
  idleMemoryPct: 30,
  busyCpuPct: 80,
  busyMemoryPct: 85,
});

export function classifyEfficiency(
  avgCpu: number | null,
  avgMemory: number | null,
): EfficiencyCategory {
  if (
    avgCpu !== null && avgMemory !== null &&
    avgCpu < EFFICIENCY_BANDS.idleCpuPct && avgMemory < EFFICIENCY_BANDS.idleMemoryPct
  ) {
    return 'underutilized';
  }
  if (
    (avgCpu !== null && avgCpu > EFFICIENCY_BANDS.busyCpuPct) ||
    (avgMemory !== null && avgMemory > EFFICIENCY_BANDS.busyMemoryPct)
  ) {
    return 'high_utilization';
  }
  return 'normal';
}

type MeasurementValues = Record<ClusterMeasurement, number[]>;

function emptyValues(): MeasurementValues {
  return {
    cpu_utilization_pct: [],
    cpu_wait_pct: [],
    memory_utilization_pct: [],
    network_received_mb: [],
    network_sent_mb: [],
  };
}

/** Mergeable running state for one cluster. */
export class ClusterSampleAccumulator {
  private readonly values: MeasurementValues = emptyValues();
  private samples = 0;
  private driverSamples = 0;
  private lowCpuSamples = 0;
  private lowMemorySamples = 0;

  constructor(readonly clusterId: string) {}

  add(sample: ClusterSample): void {
    this.samples++;
    if (sample.is_driver) this.driverSamples++;
    if (sample.cpu_utilization_pct !== null && sample.cpu_utilization_pct < LOW_CPU_SAMPLE_PCT) {
      this.lowCpuSamples++;
    }
    if (sample.memory_utilization_pct !== null && sample.memory_utilization_pct < LOW_MEMORY_SAMPLE_PCT) {
      this.lowMemorySamples++;
    }
    for (const measurement of CLUSTER_MEASUREMENTS) {
      const value = sample[measurement];
      // Missing readings stay out of that metric's statistics
      if (value !== null) this.values[measurement].push(value);
    }
  }

  merge(other: ClusterSampleAccumulator): void {
    if (other.clusterId !== this.clusterId) {
      throw new Error(`Cannot merge cluster ${other.clusterId} into ${this.clusterId}`);
    }
    this.samples += other.samples;
    this.driverSamples += other.driverSamples;
    this.lowCpuSamples += other.lowCpuSamples;
    this.lowMemorySamples += other.lowMemorySamples;
    for (const measurement of CLUSTER_MEASUREMENTS) {
      this.values[measurement].push(...other.values[measurement]);
    }
  }

  finalize(): ClusterMetrics | null {
    if (this.samples === 0) return null;

    const stats = (measurement: ClusterMeasurement): NumericSummary | null =>
      summarize(sortAscending(this.values[measurement]));
    const cpu = stats('cpu_utilization_pct');
    const wait = stats('cpu_wait_pct');
    const memory = stats('memory_utilization_pct');
    const received = stats('network_received_mb');
    const sent = stats('network_sent_mb');

    return {
      cluster_id: this.clusterId,
      // Majority role; an even split reports as driver
      is_driver: this.driverSamples * 2 >= this.samples,
      data_points: this.samples,
      avg_cpu_utilization: cpu?.mean ?? null,
      peak_cpu_utilization: cpu?.max ?? null,
      min_cpu_utilization: cpu?.min ?? null,
      avg_cpu_wait: wait?.mean ?? null,
      max_cpu_wait: wait?.max ?? null,
      avg_memory_utilization: memory?.mean ?? null,
      max_memory_utilization: memory?.max ?? null,
      min_memory_utilization: memory?.min ?? null,
      avg_network_received_mb: received?.mean ?? null,
      avg_network_sent_mb: sent?.mean ?? null,
      // Over every sample, so a missing reading never counts as low
      low_cpu_percent: safeDivide(this.lowCpuSamples * 100, this.samples),
      low_memory_percent: safeDivide(this.lowMemorySamples * 100, this.samples),
      efficiency_category: classifyEfficiency(cpu?.mean ?? null, memory?.mean ?? null),
    };
  }
}

export function accumulateClusterSamples(
  samples: readonly ClusterSample[],
): Map<string, ClusterSampleAccumulator> {
  const groups = new Map<string, ClusterSampleAccumulator>();
  for (const sample of samples) {
    let acc = groups.get(sample.cluster_id);
    if (!acc) {
      acc = new ClusterSampleAccumulator(sample.cluster_id);
      groups.set(sample.cluster_id, acc);
    }
    acc.add(sample);
  }
  return groups;
}

export function mergeClusterAccumulators(
  partitions: Iterable<Map<string, ClusterSampleAccumulator>>,
): Map<string, ClusterSampleAccumulator> {
  const merged = new Map<string, ClusterSampleAccumulator>();
  for (const partition of partitions) {
    for (const [clusterId, acc] of partition) {
      let target = merged.get(clusterId);
      if (!target) {
        target = new ClusterSampleAccumulator(clusterId);
        merged.set(clusterId, target);
      }
      target.merge(acc);
    }
  }
  return merged;
}

export function finalizeClusterAccumulators(
  groups: Map<string, ClusterSampleAccumulator>,
): Map<string, ClusterMetrics> {
  const metrics = new Map<string, ClusterMetrics>();
  for (const [clusterId, acc] of groups) {
    const result = acc.finalize();
    if (result) metrics.set(clusterId, result);
  }
  return metrics;
}

/** Per-cluster utilization statistics keyed by cluster id. */
export function aggregateClusterSamples(
  samples: readonly ClusterSample[],
): Map<string, ClusterMetrics> {
  return finalizeClusterAccumulators(accumulateClusterSamples(samples));
}
