import { describe, it, expect } from 'vitest';
import { InMemoryReviewRepository } from '../../../src/infrastructure/persistence/in-memory-review.repository';
import { ReviewRecord, ReviewStatus } from '../../../src/core/domain/entities/review.entity';

function record(id: string, prNumber: number, startedAt: string): ReviewRecord {
  return new ReviewRecord(id, 'acme/shop', prNumber, new Date(startedAt), ReviewStatus.CANCELLED, 2, 0);
}

describe('InMemoryReviewRepository', () => {
  it('should store and find records by id', async () => {
    const repository = new InMemoryReviewRepository();
    const saved = await repository.save(record('r1', 1, '2026-03-01T10:00:00.000Z'));

    expect(await repository.findById('r1')).toBe(saved);
    expect(await repository.findById('r2')).toBeNull();
  });
});
