import type {
  AnomalyCategory,
  ClusterAnomalies,
  ClusterAnomalyCategory,
  ClusterFinding,
  JobAnomalies,
  AnomalyFinding,
} from '../models/metrics.js';

export type AlertSeverity = 'critical' | 'warning' | 'info';

export interface Alert {
  source: 'job' | 'cluster';
  category: AnomalyCategory | ClusterAnomalyCategory;
  /** Job name (falling back to its id) or cluster id. */
  subject: string;
  detail: AnomalyFinding | ClusterFinding;
}

export type AlertsBySeverity = Record<AlertSeverity, Alert[]>;

const SEVERITY: Record<AnomalyCategory | ClusterAnomalyCategory, AlertSeverity> = {
  high_failure_rate: 'critical',
  overutilized: 'critical',
  long_running: 'warning',
  underutilized: 'warning',
  inefficient: 'info',
};

/** Bucket findings by severity, keeping each list in rank order. */
export function classifyAlerts(
  jobFindings: JobAnomalies,
  clusterFindings: ClusterAnomalies,
): AlertsBySeverity {
  const alerts: AlertsBySeverity = { critical: [], warning: [], info: [] };

  const jobs = [...jobFindings.high_failure_rate, ...jobFindings.long_running];
  for (const finding of jobs) {
    alerts[SEVERITY[finding.category]].push({
      source: 'job',
      category: finding.category,
      subject: finding.job.job_name ?? finding.job.job_id,
      detail: finding,
    });
  }

  const clusters = [
    ...clusterFindings.overutilized,
    ...clusterFindings.underutilized,
    ...clusterFindings.inefficient,
  ];
  for (const finding of clusters) {
    alerts[SEVERITY[finding.category]].push({
      source: 'cluster',
      category: finding.category,
      subject: finding.cluster_id,
      detail: finding,
    });
  }

  return alerts;
}
