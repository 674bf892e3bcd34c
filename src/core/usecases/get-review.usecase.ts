import { Inject, Injectable } from '@nestjs/common';
import { ReviewRecord } from '../domain/entities/review.entity';
import { REVIEW_REPOSITORY_TOKEN } from '../domain/repositories/injection-tokens';
import type { ReviewRepository } from '../domain/repositories/review.repository';
import { TaskScheduler } from '../services/task-scheduler.service';

@Injectable()
export class GetReviewUseCase {
  constructor(
    private readonly scheduler: TaskScheduler,
    @Inject(REVIEW_REPOSITORY_TOKEN) private readonly reviewRepository: ReviewRepository,
  ) {}

  async execute(id: string): Promise<ReviewRecord | null> {
    // a running review is only known to the scheduler
    return this.scheduler.describe(id) ?? this.reviewRepository.findById(id);
  }
}
