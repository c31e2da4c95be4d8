import { describe, it, expect } from 'vitest';
import { fromJobRunTimelineRow, fromNodeTimelineRow } from './system-table-rows.js';
import { normalizeClusterSamples, normalizeJobRuns } from './row-normalizer.js';

describe('system-table-rows', () => {
  describe('fromJobRunTimelineRow', () => {
    it('derives the duration from the period bounds', () => {
      const row = fromJobRunTimelineRow({
        workspace_id: '123',
        job_id: '456',
        run_name: 'daily-load',
        period_start_time: '2026-10-01T00:00:00Z',
        period_end_time: '2026-10-01T00:02:30Z',
        result_state: 'SUCCEEDED',
      });

      expect(row).toEqual({
        workspace_id: '123',
        job_id: '456',
        job_name: 'daily-load',
        duration_seconds: 150,
        status: 'SUCCEEDED',
        start_time: '2026-10-01T00:00:00Z',
      });
    });

    it('leaves the duration null when a bound is missing or reversed', () => {
      const open = fromJobRunTimelineRow({ job_id: '1', period_start_time: '2026-10-01T00:00:00Z' });
      const reversed = fromJobRunTimelineRow({
        job_id: '1',
        period_start_time: '2026-10-01T01:00:00Z',
        period_end_time: '2026-10-01T00:00:00Z',
      });

      expect(open).toMatchObject({ duration_seconds: null });
      expect(reversed).toMatchObject({ duration_seconds: null });
    });

    it('produces rows the normalizer accepts', () => {
      const result = normalizeJobRuns([
        fromJobRunTimelineRow({
          workspace_id: 9,
          job_id: 10,
          job_name: 'ingest',
          period_start_time: '2026-10-01T00:00:00Z',
          period_end_time: '2026-10-01T01:00:00Z',
          result_state: 'TIMEOUT',
        }),
        fromJobRunTimelineRow({ workspace_id: 9, job_id: 11 }),
      ]);

      expect(result.accepted).toBe(1);
      expect(result.records[0]).toMatchObject({ job_id: '10', duration_seconds: 3600, status: 'failed' });
      expect(result.issues[0]).toMatchObject({ index: 1, field: 'duration_seconds' });
    });

    it('passes non-object rows through unchanged', () => {
      expect(fromJobRunTimelineRow(null)).toBeNull();
      expect(fromJobRunTimelineRow('x')).toBe('x');
    });
  });

  describe('fromNodeTimelineRow', () => {
    it('sums user and system CPU and converts bytes to MB', () => {
      const row = fromNodeTimelineRow({
        cluster_id: 'c-1',
        driver: true,
        cpu_user_percent: 30,
        cpu_system_percent: '5',
        cpu_wait_percent: 1.5,
        mem_used_percent: 62,
        network_received_bytes: 3 * 1024 * 1024,
        network_sent_bytes: 512 * 1024,
      });

      expect(row).toEqual({
        cluster_id: 'c-1',
        is_driver: true,
        cpu_utilization_pct: 35,
        cpu_wait_pct: 1.5,
        memory_utilization_pct: 62,
        network_received_mb: 3,
        network_sent_mb: 0.5,
      });
    });

    it('treats CPU as missing when either component is missing', () => {
      expect(fromNodeTimelineRow({ cluster_id: 'c', cpu_user_percent: 10 })).toMatchObject({
        cpu_utilization_pct: null,
        network_received_mb: null,
      });
    });

    it('hands non-numeric readings to the normalizer for rejection', () => {
      const result = normalizeClusterSamples([
        fromNodeTimelineRow({ cluster_id: 'c', cpu_user_percent: 'n/a', cpu_system_percent: 1 }),
      ]);

      expect(result.skipped).toBe(1);
      expect(result.issues[0].field).toBe('cpu_utilization_pct');
    });
  });
});
