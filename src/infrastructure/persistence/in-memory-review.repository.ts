import { Injectable } from '@nestjs/common';
import { ReviewRecord } from '../../core/domain/entities/review.entity';
import { ReviewRepository } from '../../core/domain/repositories/review.repository';

/**
 * InMemoryReviewRepository - keeps finished reviews for the lifetime of the process.
 */
@Injectable()
export class InMemoryReviewRepository implements ReviewRepository {
  private reviews: Map<string, ReviewRecord> = new Map();

  async save(record: ReviewRecord): Promise<ReviewRecord> {
    this.reviews.set(record.id, record);
    return record;
  }

  async findById(id: string): Promise<ReviewRecord | null> {
    return this.reviews.get(id) ?? null;
  }
}
