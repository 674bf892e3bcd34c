import { Injectable } from '@nestjs/common';
import { ReviewConflictError, ReviewNotFoundError } from '../domain/errors/review.errors';
import { TaskScheduler } from '../services/task-scheduler.service';

@Injectable()
export class CancelReviewUseCase {
  constructor(private readonly scheduler: TaskScheduler) {}

  /**
   * @throws ReviewNotFoundError when no such review exists
   * @throws ReviewConflictError when the review has already finished
   */
  execute(id: string, reason?: string): void {
    switch (this.scheduler.cancel(id, reason)) {
      case 'unknown':
        throw new ReviewNotFoundError(id);
      case 'finished':
        throw new ReviewConflictError(`Review ${id} has already finished`);
      case 'cancelled':
        return;
    }
  }
}
