import { Finding, FindingJson, Severity, SEVERITY_RANK } from './finding.entity';

export type SeverityBreakdown = Record<Severity, number>;

/** file path -> agent name -> findings in production order */
export type FileResults = ReadonlyMap<string, ReadonlyMap<string, readonly Finding[]>>;

export interface ReviewSummary {
  totalFiles: number;
  totalIssues: number;
  criticalIssues: number;
  severityBreakdown: Readonly<SeverityBreakdown>;
  categoryBreakdown: ReadonlyMap<string, number>;
  durationSeconds: number;
  agentsUsed: readonly string[];
}

export interface ReviewSummaryJson {
  total_files: number;
  total_issues: number;
  critical_issues: number;
  severity_breakdown: SeverityBreakdown;
  category_breakdown: Record<string, number>;
  duration_seconds: number;
  agents_used: string[];
}

export interface ReviewReportJson {
  pr_number: number;
  repo_name: string;
  start_time: string;
  end_time: string;
  summary: ReviewSummaryJson;
  file_results: Record<string, Record<string, FindingJson[]>>;
}

export function emptySeverityBreakdown(): SeverityBreakdown {
  return {
    [Severity.CRITICAL]: 0,
    [Severity.HIGH]: 0,
    [Severity.MEDIUM]: 0,
    [Severity.LOW]: 0,
    [Severity.INFO]: 0,
  };
}

export function summaryToJson(summary: ReviewSummary): ReviewSummaryJson {
  const severityBreakdown = emptySeverityBreakdown();
  for (const severity of SEVERITY_RANK) {
    severityBreakdown[severity] = summary.severityBreakdown[severity];
  }

  return {
    total_files: summary.totalFiles,
    total_issues: summary.totalIssues,
    critical_issues: summary.criticalIssues,
    severity_breakdown: severityBreakdown,
    category_breakdown: Object.fromEntries(summary.categoryBreakdown),
    duration_seconds: summary.durationSeconds,
    agents_used: [...summary.agentsUsed],
  };
}

export function fileResultsToJson(fileResults: FileResults): ReviewReportJson['file_results'] {
  const json: ReviewReportJson['file_results'] = {};
  for (const [filePath, agents] of fileResults) {
    const byAgent: Record<string, FindingJson[]> = {};
    for (const [agentName, findings] of agents) {
      byAgent[agentName] = findings.map(finding => finding.toJSON());
    }
    json[filePath] = byAgent;
  }
  return json;
}

/**
 * Sealed result of a review. Only built by the ReportBuilder once every task
 * of the review has settled; never mutated afterwards.
 */
export class ReviewReport {
  constructor(
    public readonly prNumber: number,
    public readonly repoName: string,
    public readonly startTime: Date,
    public readonly endTime: Date,
    public readonly summary: ReviewSummary,
    public readonly fileResults: FileResults,
  ) {
    Object.freeze(this);
  }

  toJSON(): ReviewReportJson {
    return {
      pr_number: this.prNumber,
      repo_name: this.repoName,
      start_time: this.startTime.toISOString(),
      end_time: this.endTime.toISOString(),
      summary: summaryToJson(this.summary),
      file_results: fileResultsToJson(this.fileResults),
    };
  }
}
