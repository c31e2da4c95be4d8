/**
 * Adapters from system-table row shapes (job run timeline, node timeline) to
 * the raw rows the normalizer accepts. They only rename and derive columns;
 * validation stays with the normalizer, so an unusable value is passed on in a
 * form the normalizer will reject.
 */
import { parseTimestamp } from '../models/telemetry.js';

const BYTES_PER_MB = 1024 * 1024;

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

// NaN for anything non-numeric, so the normalizer flags the derived column.
function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

function sumReadings(a: unknown, b: unknown): number | null {
  if (isMissing(a) || isMissing(b)) return null;
  return toNumber(a) + toNumber(b);
}

function bytesToMb(value: unknown): number | null {
  if (isMissing(value)) return null;
  return toNumber(value) / BYTES_PER_MB;
}

/** Run duration from the period bounds; null unless both parse and end >= start. */
function durationSeconds(start: unknown, end: unknown): number | null {
  const startMs = parseTimestamp(start);
  const endMs = parseTimestamp(end);
  if (startMs === null || endMs === null || endMs < startMs) return null;
  return (endMs - startMs) / 1000;
}

export function fromJobRunTimelineRow(row: unknown): unknown {
  if (!isRow(row)) return row;
  return {
    workspace_id: row.workspace_id,
    job_id: row.job_id,
    job_name: row.job_name ?? row.run_name,
    duration_seconds: durationSeconds(row.period_start_time, row.period_end_time),
    status: row.result_state,
    start_time: row.period_start_time,
  };
}

export function fromNodeTimelineRow(row: unknown): unknown {
  if (!isRow(row)) return row;
  return {
    cluster_id: row.cluster_id,
    is_driver: row.driver,
    cpu_utilization_pct: sumReadings(row.cpu_user_percent, row.cpu_system_percent),
    cpu_wait_pct: row.cpu_wait_percent,
    memory_utilization_pct: row.mem_used_percent,
    network_received_mb: bytesToMb(row.network_received_bytes),
    network_sent_mb: bytesToMb(row.network_sent_bytes),
  };
}
