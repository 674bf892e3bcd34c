import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AgentRegistry } from '../agents/agent.registry';
import type { ReviewAgent } from '../agents/review-agent';
import type { ReviewSettings } from '../config/review.settings';
import { ReviewFile, ReviewHandle, ReviewRequest } from '../domain/entities/review-request.entity';
import { ReviewOutcome, ReviewRecord, ReviewStatus } from '../domain/entities/review.entity';
import {
  describeError,
  ReviewCancelledError,
  ReviewConflictError,
  ReviewNotFoundError,
  ReviewRejectedError,
} from '../domain/errors/review.errors';
import { REVIEW_REPOSITORY_TOKEN, REVIEW_SETTINGS_TOKEN } from '../domain/repositories/injection-tokens';
import type { ReviewRepository } from '../domain/repositories/review.repository';
import { OrchestrationContext } from '../orchestration/orchestration.context';
import type { WorkerSlot } from '../orchestration/worker-pool';
import { AgentRunner } from './agent-runner.service';
import { ReportBuilder } from './report-builder.service';
import { ResultAggregator } from './result-aggregator';
import { isReviewableFile } from './reviewable-files';

export type CancelResult = 'cancelled' | 'finished' | 'unknown';

interface ActiveReview {
  readonly id: string;
  readonly repoName: string;
  readonly prNumber: number;
  readonly startedAt: Date;
  readonly controller: AbortController;
  readonly aggregator: ResultAggregator;
  readonly tasksTotal: number;
  tasksSettled: number;
  settling: boolean;
  cancelReason?: string;
  timeout?: ReturnType<typeof setTimeout>;
}

/**
 * Expands reviews into (file × agent) tasks and runs them on the shared worker pool.
 *
 * Every task of every review competes for the same pool; results go to the review's
 * own ResultAggregator as they arrive, and the review is sealed once all of its
 * tasks have settled.
 */
@Injectable()
export class TaskScheduler implements OnModuleDestroy {
  private readonly logger = new Logger(TaskScheduler.name);
  private readonly active = new Map<string, ActiveReview>();
  private readonly completions = new Map<string, Promise<ReviewOutcome>>();
  private readonly finished = new Set<string>();

  constructor(
    private readonly context: OrchestrationContext,
    private readonly runner: AgentRunner,
    private readonly registry: AgentRegistry,
    private readonly reportBuilder: ReportBuilder,
    @Inject(REVIEW_REPOSITORY_TOKEN) private readonly reviews: ReviewRepository,
    @Inject(REVIEW_SETTINGS_TOKEN) private readonly settings: ReviewSettings,
  ) {}

  /**
   * Starts a review and returns immediately.
   *
   * @throws ReviewRejectedError when there is nothing to review or an agent is unknown
   * @throws ReviewConflictError when the same pull request is already under review
   */
  submit(request: ReviewRequest): ReviewHandle {
    const files = this.selectFiles(request.files);
    const agents = this.registry.resolve(request.agents);
    this.assertNotUnderReview(request.repoName, request.prNumber);

    const id = uuidv4();
    const startedAt = new Date();
    const review: ActiveReview = {
      id,
      repoName: request.repoName,
      prNumber: request.prNumber,
      startedAt,
      controller: new AbortController(),
      aggregator: new ResultAggregator(
        id,
        startedAt,
        files.map(file => file.path),
        agents.map(agent => agent.name),
      ),
      tasksTotal: files.length * agents.length,
      tasksSettled: 0,
      settling: false,
    };
    this.active.set(id, review);

    const tasks = files.flatMap(file => agents.map(agent => this.runTask(review, file, agent)));
    this.completions.set(id, Promise.allSettled(tasks).then(() => this.settle(review)));

    const reviewTimeoutMs = this.settings.reviewTimeoutMs;
    if (reviewTimeoutMs > 0) {
      review.timeout = setTimeout(
        () => this.cancel(id, `review timed out after ${reviewTimeoutMs / 1000}s`),
        reviewTimeoutMs,
      );
    }

    this.logger.log(
      `Review ${id} of ${request.repoName}#${request.prNumber} started: ` +
        `${files.length} file(s) x ${agents.length} agent(s) [${agents.map(agent => agent.name).join(', ')}]`,
    );

    return {
      id,
      repoName: request.repoName,
      prNumber: request.prNumber,
      startedAt,
      tasksTotal: review.tasksTotal,
    };
  }

  /**
   * Cancels a running review: no new task starts, running ones unwind at their next
   * suspension point, and partial results are thrown away.
   */
  cancel(reviewId: string, reason = 'cancelled by request'): CancelResult {
    const review = this.active.get(reviewId);
    if (!review) {
      return this.finished.has(reviewId) ? 'finished' : 'unknown';
    }
    if (review.controller.signal.aborted) {
      return 'cancelled';
    }
    if (review.settling) {
      return 'finished';
    }

    review.cancelReason = reason;
    review.aggregator.discard();
    review.controller.abort(new ReviewCancelledError(reviewId, reason));
    this.clearReviewTimeout(review);
    this.logger.log(`Review ${reviewId} cancelled (${reason}) with ${review.tasksSettled}/${review.tasksTotal} task(s) settled`);
    return 'cancelled';
  }

  /**
   * Resolves once every task of the review has settled: with the sealed report,
   * or with a cancellation outcome.
   */
  async awaitCompletion(reviewId: string): Promise<ReviewOutcome> {
    const pending = this.completions.get(reviewId);
    if (pending) {
      return pending;
    }

    const record = await this.reviews.findById(reviewId);
    const outcome = record?.toOutcome();
    if (!outcome) {
      throw new ReviewNotFoundError(reviewId);
    }
    return outcome;
  }

  /**
   * Live status of a review still held here, or null once it has settled. A cancelled
   * review whose tasks are still unwinding already reports as cancelled.
   */
  describe(reviewId: string): ReviewRecord | null {
    const review = this.active.get(reviewId);
    if (!review) {
      return null;
    }
    if (review.controller.signal.aborted) {
      return new ReviewRecord(
        review.id,
        review.repoName,
        review.prNumber,
        review.startedAt,
        ReviewStatus.CANCELLED,
        review.tasksTotal,
        review.tasksSettled,
        undefined,
        undefined,
        review.cancelReason,
      );
    }
    return new ReviewRecord(
      review.id,
      review.repoName,
      review.prNumber,
      review.startedAt,
      ReviewStatus.IN_PROGRESS,
      review.tasksTotal,
      review.tasksSettled,
    );
  }

  get activeReviews(): number {
    return this.active.size;
  }

  onModuleDestroy(): void {
    for (const reviewId of [...this.active.keys()]) {
      this.cancel(reviewId, 'service shutting down');
    }
  }

  private selectFiles(files: readonly ReviewFile[]): ReviewFile[] {
    if (files.length === 0) {
      throw new ReviewRejectedError('The review request contains no changed files');
    }

    const selected = new Map<string, ReviewFile>();
    for (const file of files) {
      if (!isReviewableFile(file.path)) {
        this.logger.debug(`Skipping non-code file: ${file.path}`);
        continue;
      }
      if (selected.has(file.path)) {
        this.logger.warn(`Ignoring duplicate entry for ${file.path}`);
        continue;
      }
      selected.set(file.path, file);
    }

    if (selected.size === 0) {
      throw new ReviewRejectedError(`None of the ${files.length} changed file(s) is a reviewable source file`);
    }
    return [...selected.values()];
  }

  private assertNotUnderReview(repoName: string, prNumber: number): void {
    for (const review of this.active.values()) {
      if (review.repoName === repoName && review.prNumber === prNumber && !review.controller.signal.aborted) {
        throw new ReviewConflictError(`Review ${review.id} is already in progress for ${repoName}#${prNumber}`);
      }
    }
  }

  private async runTask(review: ActiveReview, file: ReviewFile, agent: ReviewAgent): Promise<void> {
    const signal = review.controller.signal;
    let slot: WorkerSlot | undefined;

    try {
      slot = await this.context.workerPool.acquire(review.id, signal);
      const result = await this.runner.run({ file, agent, signal });
      review.aggregator.record(file.path, agent.name, result);
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug(`Task ${agent.name}/${file.path} of review ${review.id} unwound after cancellation`);
      } else {
        this.logger.error(`Task ${agent.name}/${file.path} of review ${review.id} failed unexpectedly: ${describeError(error)}`);
      }
    } finally {
      slot?.release();
      review.tasksSettled++;
    }
  }

  private async settle(review: ActiveReview): Promise<ReviewOutcome> {
    review.settling = true;
    this.clearReviewTimeout(review);

    const outcome: ReviewOutcome = review.controller.signal.aborted
      ? { status: ReviewStatus.CANCELLED, reviewId: review.id, reason: review.cancelReason ?? 'cancelled' }
      : {
          status: ReviewStatus.COMPLETED,
          reviewId: review.id,
          report: this.reportBuilder.finalize(review.aggregator, review),
        };

    const record = this.describe(review.id)?.finish(outcome);
    try {
      if (record) {
        await this.reviews.save(record);
      }
    } catch (error) {
      this.logger.error(`Failed to store the outcome of review ${review.id}: ${describeError(error)}`);
    } finally {
      this.finished.add(review.id);
      this.active.delete(review.id);
      this.completions.delete(review.id);
    }

    return outcome;
  }

  private clearReviewTimeout(review: ActiveReview): void {
    if (review.timeout !== undefined) {
      clearTimeout(review.timeout);
      review.timeout = undefined;
    }
  }
}
