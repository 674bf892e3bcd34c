import type { ReviewSettings } from '../config/review.settings';
import { RateLimiter } from './rate-limiter';
import { WorkerPool } from './worker-pool';

/**
 * Resources shared by every review in the process. Passed by reference to the
 * scheduler and the runners instead of living in module-level singletons.
 */
export class OrchestrationContext {
  constructor(
    public readonly rateLimiter: RateLimiter,
    public readonly workerPool: WorkerPool,
  ) {}

  static fromSettings(settings: Pick<ReviewSettings, 'maxRequestsPerMinute' | 'maxConcurrentTasks'>): OrchestrationContext {
    return new OrchestrationContext(
      new RateLimiter(settings.maxRequestsPerMinute),
      new WorkerPool(settings.maxConcurrentTasks),
    );
  }
}
