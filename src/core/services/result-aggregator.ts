import { Logger } from '@nestjs/common';
import { AgentResult } from '../domain/entities/agent-result.entity';
import { Finding, Severity } from '../domain/entities/finding.entity';
import { emptySeverityBreakdown, FileResults, ReviewSummary } from '../domain/entities/review-report.entity';

export interface AggregateSnapshot {
  fileResults: FileResults;
  summary: ReviewSummary;
}

export type AnomalyKind = 'duplicate_record' | 'late_record';

export interface AggregationAnomaly {
  kind: AnomalyKind;
  filePath: string;
  agentName: string;
  detectedAt: Date;
}

type AggregatorState = 'open' | 'sealed' | 'discarded';

function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Summary statistics of a file_results structure. A pure full pass: the same
 * input always gives the same summary, keys in the same order.
 *
 * Categories are ranked by count (descending) then by key; agents are listed
 * in order of first appearance.
 */
export function summarize(fileResults: FileResults, durationSeconds: number): ReviewSummary {
  const severityBreakdown = emptySeverityBreakdown();
  const categoryCounts = new Map<string, number>();
  const agentsUsed: string[] = [];
  let totalIssues = 0;

  for (const agents of fileResults.values()) {
    for (const [agentName, findings] of agents) {
      if (!agentsUsed.includes(agentName)) {
        agentsUsed.push(agentName);
      }
      for (const finding of findings) {
        totalIssues++;
        severityBreakdown[finding.severity]++;
        categoryCounts.set(finding.category, (categoryCounts.get(finding.category) ?? 0) + 1);
      }
    }
  }

  const categoryBreakdown = new Map(
    [...categoryCounts.entries()].sort(([keyA, countA], [keyB, countB]) => countB - countA || compareKeys(keyA, keyB)),
  );

  return {
    totalFiles: fileResults.size,
    totalIssues,
    criticalIssues: severityBreakdown[Severity.CRITICAL],
    severityBreakdown,
    categoryBreakdown,
    durationSeconds,
    agentsUsed,
  };
}

function orderKeys(keys: Iterable<string>, preferred: readonly string[]): string[] {
  const rank = (key: string) => {
    const index = preferred.indexOf(key);
    return index === -1 ? preferred.length : index;
  };
  // Array.prototype.sort is stable, so unknown keys keep their insertion order
  return [...keys].sort((a, b) => rank(a) - rank(b));
}

/**
 * Collects the agent results of one review. Only the task-completion handlers of
 * that review write to it, one at a time.
 */
export class ResultAggregator {
  private readonly logger = new Logger(ResultAggregator.name);
  private readonly results = new Map<string, Map<string, readonly Finding[]>>();
  private readonly recordedAnomalies: AggregationAnomaly[] = [];
  private state: AggregatorState = 'open';

  constructor(
    public readonly reviewId: string,
    public readonly startTime: Date,
    private readonly fileOrder: readonly string[] = [],
    private readonly agentOrder: readonly string[] = [],
  ) {}

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get isDiscarded(): boolean {
    return this.state === 'discarded';
  }

  get anomalies(): readonly AggregationAnomaly[] {
    return this.recordedAnomalies;
  }

  /**
   * Stores the findings of one (file, agent) task.
   * Returns false when the result was dropped because the review is sealed or discarded.
   */
  record(filePath: string, agentName: string, result: AgentResult): boolean {
    if (this.state !== 'open') {
      this.flag('late_record', filePath, agentName);
      this.logger.warn(
        `Dropping late result of ${agentName} for ${filePath}: review ${this.reviewId} is already ${this.state}`,
      );
      return false;
    }

    let agents = this.results.get(filePath);
    if (!agents) {
      agents = new Map();
      this.results.set(filePath, agents);
    }

    if (agents.has(agentName)) {
      this.flag('duplicate_record', filePath, agentName);
      this.logger.error(
        `Scheduling consistency violation in review ${this.reviewId}: ${agentName} recorded twice for ${filePath}, keeping the later result`,
      );
    }

    agents.set(agentName, Object.freeze([...result.findings]));
    return true;
  }

  /**
   * Current results in request order (files) and enabled-agent order (agents)
   * with a freshly computed summary. Empty once the review has been discarded.
   */
  snapshot(at: Date = new Date()): AggregateSnapshot {
    const fileResults = new Map<string, ReadonlyMap<string, readonly Finding[]>>();
    for (const filePath of orderKeys(this.results.keys(), this.fileOrder)) {
      const agents = this.results.get(filePath);
      if (!agents) {
        continue;
      }
      const ordered = new Map<string, readonly Finding[]>();
      for (const agentName of orderKeys(agents.keys(), this.agentOrder)) {
        const findings = agents.get(agentName);
        if (findings) {
          ordered.set(agentName, findings);
        }
      }
      fileResults.set(filePath, ordered);
    }

    const durationSeconds = (at.getTime() - this.startTime.getTime()) / 1000;
    return { fileResults, summary: summarize(fileResults, durationSeconds) };
  }

  seal(): void {
    if (this.state !== 'open') {
      throw new Error(`Cannot seal review ${this.reviewId}: it is already ${this.state}`);
    }
    this.state = 'sealed';
  }

  /** Drops every partial result. Used when the review is cancelled. */
  discard(): void {
    if (this.state === 'sealed') {
      throw new Error(`Cannot discard review ${this.reviewId}: it is already sealed`);
    }
    this.results.clear();
    this.state = 'discarded';
  }

  private flag(kind: AnomalyKind, filePath: string, agentName: string): void {
    this.recordedAnomalies.push({ kind, filePath, agentName, detectedAt: new Date() });
  }
}
