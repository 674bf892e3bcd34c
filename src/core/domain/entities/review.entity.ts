import { ReviewReport, ReviewReportJson } from './review-report.entity';

export enum ReviewStatus {
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export type ReviewOutcome =
  | { status: ReviewStatus.COMPLETED; reviewId: string; report: ReviewReport }
  | { status: ReviewStatus.CANCELLED; reviewId: string; reason: string };

export interface ReviewRecordJson {
  review_id: string;
  status: ReviewStatus;
  repo: string;
  pr_number: number;
  started_at: string;
  completed_at: string | null;
  tasks_total: number;
  tasks_settled: number;
  cancel_reason?: string;
  report?: ReviewReportJson;
}

/**
 * Status view of a review. While a review is running it never carries a report;
 * the report is attached only once it has been sealed.
 */
export class ReviewRecord {
  constructor(
    public readonly id: string,
    public readonly repoName: string,
    public readonly prNumber: number,
    public readonly startedAt: Date,
    public readonly status: ReviewStatus,
    public readonly tasksTotal: number,
    public readonly tasksSettled: number = 0,
    public readonly completedAt?: Date,
    public readonly report?: ReviewReport,
    public readonly cancelReason?: string,
  ) {}

  finish(outcome: ReviewOutcome, completedAt: Date = new Date()): ReviewRecord {
    if (outcome.status === ReviewStatus.COMPLETED) {
      return new ReviewRecord(
        this.id,
        this.repoName,
        this.prNumber,
        this.startedAt,
        ReviewStatus.COMPLETED,
        this.tasksTotal,
        this.tasksTotal,
        outcome.report.endTime,
        outcome.report,
      );
    }

    return new ReviewRecord(
      this.id,
      this.repoName,
      this.prNumber,
      this.startedAt,
      ReviewStatus.CANCELLED,
      this.tasksTotal,
      this.tasksSettled,
      completedAt,
      undefined,
      outcome.reason,
    );
  }

  toOutcome(): ReviewOutcome | null {
    if (this.status === ReviewStatus.COMPLETED && this.report) {
      return { status: ReviewStatus.COMPLETED, reviewId: this.id, report: this.report };
    }
    if (this.status === ReviewStatus.CANCELLED) {
      return { status: ReviewStatus.CANCELLED, reviewId: this.id, reason: this.cancelReason ?? 'cancelled' };
    }
    return null;
  }

  toJSON(): ReviewRecordJson {
    const json: ReviewRecordJson = {
      review_id: this.id,
      status: this.status,
      repo: this.repoName,
      pr_number: this.prNumber,
      started_at: this.startedAt.toISOString(),
      completed_at: this.completedAt ? this.completedAt.toISOString() : null,
      tasks_total: this.tasksTotal,
      tasks_settled: this.tasksSettled,
    };
    if (this.cancelReason !== undefined) {
      json.cancel_reason = this.cancelReason;
    }
    if (this.report) {
      json.report = this.report.toJSON();
    }
    return json;
  }
}
