import { Injectable } from '@nestjs/common';
import { ReviewHandle, ReviewRequest } from '../domain/entities/review-request.entity';
import { TaskScheduler } from '../services/task-scheduler.service';

@Injectable()
export class SubmitReviewUseCase {
  constructor(private readonly scheduler: TaskScheduler) {}

  execute(request: ReviewRequest): ReviewHandle {
    return this.scheduler.submit(request);
  }
}
