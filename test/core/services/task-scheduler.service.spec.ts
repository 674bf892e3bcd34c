import { describe, it, expect, vi } from 'vitest';
import { OrchestrationContext } from '../../../src/core/orchestration/orchestration.context';
import { RateLimiter } from '../../../src/core/orchestration/rate-limiter';
import { WorkerPool } from '../../../src/core/orchestration/worker-pool';
import { ReviewFile, ReviewRequest } from '../../../src/core/domain/entities/review-request.entity';
import { ReviewOutcome, ReviewStatus } from '../../../src/core/domain/entities/review.entity';
import { ReviewReport } from '../../../src/core/domain/entities/review-report.entity';
import { ReviewRepository } from '../../../src/core/domain/repositories/review.repository';
import {
  ReviewConflictError,
  ReviewNotFoundError,
  ReviewRejectedError,
} from '../../../src/core/domain/errors/review.errors';
import { hangUntilAborted, issuesJson, MockModelRepository, replyAfter } from '../../mocks/model.repository.mock';
import { createTestScheduler } from '../../mocks/scheduler.mock';
import { makeSettings } from '../../mocks/settings.mock';

function promptKey(role: string, filePath: string): string {
  return `${role}, review the following code changes in ${filePath}:`;
}

function request(files: string[], agents?: string[], prNumber = 1): ReviewRequest {
  return {
    repoName: 'acme/shop',
    prNumber,
    files: files.map(path => new ReviewFile(path, `+changed ${path}`)),
    agents,
  };
}

function expectReport(outcome: ReviewOutcome): ReviewReport {
  if (outcome.status !== ReviewStatus.COMPLETED) {
    throw new Error(`expected a completed review, got ${outcome.status}`);
  }
  return outcome.report;
}

const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('TaskScheduler', () => {
  it('should aggregate the findings of every agent into one sealed report', async () => {
    const model = new MockModelRepository()
      .script(promptKey('As a security expert', 'f.py'), issuesJson(
        { line: 3, severity: 'CRITICAL', category: 'sql_injection', message: 'Query concatenation' },
        { line: 8, severity: 'CRITICAL', category: 'secrets', message: 'Hardcoded password' },
        { line: 12, severity: 'LOW', category: 'crypto', message: 'md5 for checksums' },
      ))
      .script(promptKey('As a performance optimization expert', 'f.py'), issuesJson(
        { line: 20, severity: 'HIGH', category: 'database', message: 'N+1 query' },
      ));
    const { scheduler, reviews } = createTestScheduler(model);

    const handle = scheduler.submit(request(['f.py'], ['Security', 'Performance']));
    const report = expectReport(await scheduler.awaitCompletion(handle.id));

    expect(handle.tasksTotal).toBe(2);
    expect(report.summary.totalIssues).toBe(4);
    expect(report.summary.criticalIssues).toBe(2);
    expect(report.summary.severityBreakdown).toEqual({ CRITICAL: 2, HIGH: 1, MEDIUM: 0, LOW: 1, INFO: 0 });
    expect(report.summary.agentsUsed).toEqual(['Security', 'Performance']);
    expect(report.toJSON().file_results['f.py'].Security.map(finding => finding.line_number)).toEqual([3, 8, 12]);

    const record = await reviews.findById(handle.id);
    expect(record?.status).toBe(ReviewStatus.COMPLETED);
    expect(record?.tasksSettled).toBe(2);
    expect(scheduler.describe(handle.id)).toBeNull();
  });

  it('should complete with a diagnostic finding when an agent exhausts its retries', async () => {
    const model = new MockModelRepository().script(promptKey('As a security expert', 'g.py'), 'not json at all');
    const settings = makeSettings({ retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 } });
    const { scheduler } = createTestScheduler(model, settings);

    const handle = scheduler.submit(request(['g.py', 'h.py'], ['Security']));
    const report = expectReport(await scheduler.awaitCompletion(handle.id));

    const diagnostics = report.fileResults.get('g.py')?.get('Security') ?? [];
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].category).toBe('agent_failure');
    expect(diagnostics[0].lineNumber).toBe(0);
    expect(report.fileResults.get('h.py')?.get('Security')).toEqual([]);
    expect(report.summary.categoryBreakdown.get('agent_failure')).toBe(1);
    expect(model.callsFor(promptKey('As a security expert', 'g.py'))).toBe(2);
  });

  it('should discard every partial result of a cancelled review', async () => {
    const model = new MockModelRepository()
      .script(promptKey('As a security expert', 'src/a.ts'), issuesJson(
        { line: 1, severity: 'HIGH', category: 'auth', message: 'Done before the cancel' },
      ))
      .script(promptKey('As a security expert', 'src/b.ts'), hangUntilAborted);
    const { scheduler, reviews } = createTestScheduler(model);

    const handle = scheduler.submit(request(['src/a.ts', 'src/b.ts'], ['Security']));
    await wait(10);
    expect(scheduler.describe(handle.id)?.tasksSettled).toBe(1);

    expect(scheduler.cancel(handle.id)).toBe('cancelled');
    const outcome = await scheduler.awaitCompletion(handle.id);

    expect(outcome).toEqual({ status: ReviewStatus.CANCELLED, reviewId: handle.id, reason: 'cancelled by request' });
    const record = await reviews.findById(handle.id);
    expect(record?.status).toBe(ReviewStatus.CANCELLED);
    expect(record?.report).toBeUndefined();
    expect(record?.toJSON().report).toBeUndefined();
    expect(scheduler.cancel(handle.id)).toBe('finished');
  });

  it('should report a cancelled review as cancelled while its tasks unwind', () => {
    const model = new MockModelRepository(hangUntilAborted);
    const { scheduler } = createTestScheduler(model);

    const handle = scheduler.submit(request(['src/a.ts'], ['Security']));
    scheduler.cancel(handle.id, 'superseded by a new push');
    const live = scheduler.describe(handle.id);

    expect(live?.status).toBe(ReviewStatus.CANCELLED);
    expect(live?.cancelReason).toBe('superseded by a new push');
    expect(live?.completedAt).toBeUndefined();
    expect(live?.report).toBeUndefined();
  });

  it('should hand finished reviews over to the repository', async () => {
    const { scheduler, reviews } = createTestScheduler(new MockModelRepository());

    const handle = scheduler.submit(request(['src/a.ts'], ['Security']));
    const settled = await scheduler.awaitCompletion(handle.id);
    const stored = await reviews.findById(handle.id);

    expect(stored?.status).toBe(ReviewStatus.COMPLETED);
    expect(await scheduler.awaitCompletion(handle.id)).toEqual(settled);
    expect(scheduler.cancel(handle.id)).toBe('finished');
  });

  it('should never run more tasks at once than the global ceiling across reviews', async () => {
    const model = new MockModelRepository(replyAfter(5, '{"issues": []}'));
    const { scheduler, context } = createTestScheduler(model, makeSettings({ maxConcurrentTasks: 2 }));

    const handles = [1, 2, 3].map(prNumber =>
      scheduler.submit(request(['src/a.ts', 'src/b.ts'], ['Security', 'Style'], prNumber)));
    const outcomes = await Promise.all(handles.map(handle => scheduler.awaitCompletion(handle.id)));

    expect(outcomes.map(outcome => outcome.status)).toEqual([
      ReviewStatus.COMPLETED,
      ReviewStatus.COMPLETED,
      ReviewStatus.COMPLETED,
    ]);
    expect(model.requests).toHaveLength(12);
    expect(model.maxInFlight).toBe(2);
    expect(context.workerPool.inUse).toBe(0);
  });

  it('should throttle model calls across reviews with one shared rate limiter', async () => {
    const model = new MockModelRepository();
    const context = new OrchestrationContext(new RateLimiter(2, 200), new WorkerPool(5));
    const { scheduler } = createTestScheduler(model, makeSettings(), { context });

    const first = scheduler.submit(request(['src/a.ts'], ['Security', 'Style'], 1));
    const second = scheduler.submit(request(['src/b.ts'], ['Security'], 2));
    await wait(50);

    expect(model.requests).toHaveLength(2);
    expect(context.rateLimiter.pending).toBe(1);

    const outcomes = await Promise.all([scheduler.awaitCompletion(first.id), scheduler.awaitCompletion(second.id)]);

    expect(outcomes.map(outcome => outcome.status)).toEqual([ReviewStatus.COMPLETED, ReviewStatus.COMPLETED]);
    expect(model.requests).toHaveLength(3);
    expect(context.rateLimiter.pending).toBe(0);
  });

  it('should hand the slot of a cancelled review to the next one', async () => {
    const model = new MockModelRepository().script('src/stuck.ts', hangUntilAborted);
    const { scheduler } = createTestScheduler(model, makeSettings({ maxConcurrentTasks: 1 }));

    const stuck = scheduler.submit(request(['src/stuck.ts'], ['Security'], 1));
    const waiting = scheduler.submit(request(['src/ok.ts'], ['Security'], 2));
    await wait(10);
    expect(model.requests).toHaveLength(1);

    scheduler.cancel(stuck.id);
    const outcome = await scheduler.awaitCompletion(waiting.id);

    expect(outcome.status).toBe(ReviewStatus.COMPLETED);
    expect(model.requests).toHaveLength(2);
  });

  it('should cancel a review that outlives the review timeout', async () => {
    const model = new MockModelRepository(hangUntilAborted);
    const { scheduler } = createTestScheduler(model, makeSettings({ reviewTimeoutMs: 20 }));

    const handle = scheduler.submit(request(['src/a.ts'], ['Security']));
    const outcome = await scheduler.awaitCompletion(handle.id);

    expect(outcome).toEqual({
      status: ReviewStatus.CANCELLED,
      reviewId: handle.id,
      reason: 'review timed out after 0.02s',
    });
  });

  it('should reject requests with nothing to review', () => {
    const { scheduler } = createTestScheduler(new MockModelRepository());

    expect(() => scheduler.submit(request([]))).toThrow(ReviewRejectedError);
    expect(() => scheduler.submit(request(['README.md', 'package.json']))).toThrow(
      'None of the 2 changed file(s) is a reviewable source file',
    );
    expect(() => scheduler.submit(request(['src/a.ts'], ['Linting']))).toThrow(ReviewRejectedError);
    expect(scheduler.activeReviews).toBe(0);
  });

  it('should skip non-code files and duplicate entries when expanding tasks', async () => {
    const { scheduler } = createTestScheduler(new MockModelRepository());

    const handle = scheduler.submit(request(['src/a.ts', 'docs/guide.md', 'src/a.ts'], ['Security', 'Style']));
    const report = expectReport(await scheduler.awaitCompletion(handle.id));

    expect(handle.tasksTotal).toBe(2);
    expect([...report.fileResults.keys()]).toEqual(['src/a.ts']);
  });

  it('should refuse a second review of a pull request already under review', async () => {
    const model = new MockModelRepository(replyAfter(5, '{"issues": []}'));
    const { scheduler } = createTestScheduler(model);

    const first = scheduler.submit(request(['src/a.ts'], ['Security']));

    expect(() => scheduler.submit(request(['src/b.ts'], ['Security']))).toThrow(ReviewConflictError);
    await scheduler.awaitCompletion(first.id);
    expect(() => scheduler.submit(request(['src/b.ts'], ['Security']))).not.toThrow();
  });

  it('should report live progress while a review runs', async () => {
    const model = new MockModelRepository(hangUntilAborted);
    const { scheduler } = createTestScheduler(model);

    const handle = scheduler.submit(request(['src/a.ts', 'src/b.ts'], ['Security']));
    const live = scheduler.describe(handle.id);

    expect(live?.status).toBe(ReviewStatus.IN_PROGRESS);
    expect(live?.tasksTotal).toBe(2);
    expect(live?.report).toBeUndefined();

    scheduler.onModuleDestroy();
    expect(await scheduler.awaitCompletion(handle.id)).toEqual({
      status: ReviewStatus.CANCELLED,
      reviewId: handle.id,
      reason: 'service shutting down',
    });
  });

  it('should still resolve the outcome when storing the record fails', async () => {
    const reviews: ReviewRepository = {
      save: vi.fn().mockRejectedValue(new Error('disk full')),
      findById: vi.fn().mockResolvedValue(null),
    };
    const { scheduler } = createTestScheduler(new MockModelRepository(), makeSettings(), { reviews });

    const handle = scheduler.submit(request(['src/a.ts'], ['Security']));
    const outcome = await scheduler.awaitCompletion(handle.id);

    expect(outcome.status).toBe(ReviewStatus.COMPLETED);
    expect(reviews.save).toHaveBeenCalledTimes(1);
    expect(scheduler.activeReviews).toBe(0);
  });

  it('should report unknown reviews', async () => {
    const { scheduler } = createTestScheduler(new MockModelRepository());

    expect(scheduler.cancel('missing')).toBe('unknown');
    await expect(scheduler.awaitCompletion('missing')).rejects.toBeInstanceOf(ReviewNotFoundError);
  });
});
