import { ReviewRecord } from '../entities/review.entity';

/**
 * Storage for finished reviews. Running reviews are owned by the TaskScheduler.
 */
export interface ReviewRepository {
  save(record: ReviewRecord): Promise<ReviewRecord>;
  findById(id: string): Promise<ReviewRecord | null>;
}
