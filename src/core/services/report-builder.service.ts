import { Injectable, Logger } from '@nestjs/common';
import { ReviewReport } from '../domain/entities/review-report.entity';
import { ResultAggregator } from './result-aggregator';

export interface ReportTarget {
  repoName: string;
  prNumber: number;
}

@Injectable()
export class ReportBuilder {
  private readonly logger = new Logger(ReportBuilder.name);

  /**
   * Seals a review whose tasks have all settled and returns its report.
   * The aggregator accepts no further results afterwards.
   */
  finalize(aggregator: ResultAggregator, target: ReportTarget): ReviewReport {
    // never stamp an end before the start, even if the wall clock stepped back
    const endTime = new Date(Math.max(Date.now(), aggregator.startTime.getTime()));
    const { fileResults, summary } = aggregator.snapshot(endTime);
    aggregator.seal();

    this.logger.log(
      `Review ${aggregator.reviewId} of ${target.repoName}#${target.prNumber} complete: ` +
        `${summary.totalIssues} issue(s), ${summary.criticalIssues} critical, ` +
        `${summary.totalFiles} file(s) in ${summary.durationSeconds.toFixed(1)}s`,
    );

    return new ReviewReport(
      target.prNumber,
      target.repoName,
      aggregator.startTime,
      endTime,
      summary,
      fileResults,
    );
  }
}
