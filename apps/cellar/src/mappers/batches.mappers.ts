import { Batch } from '../entities/batch.entity';
import { BatchResponseDto } from '../dtos/batch-response.dto';

const DAY_MS = 24 * 60 * 60 * 1000;

export class BatchMapper {
  static toResponse(batch: Batch, now: Date = new Date()): BatchResponseDto {
    return {
      id: batch.id,
      tankId: batch.tankId,
      name: batch.name,
      active: batch.completedAt === null,
      startedAt: batch.startedAt,
      yeastAddedAt: batch.yeastAddedAt,
      stabilizerAddedAt: batch.stabilizerAddedAt,
      completedAt: batch.completedAt,
      daysInFermentation: BatchMapper.daysInFermentation(batch, now),
    };
  }

  static daysInFermentation(batch: Batch, now: Date = new Date()): number {
    const end = batch.completedAt ?? now;
    const elapsed = end.getTime() - batch.startedAt.getTime();
    return Math.max(0, Math.floor(elapsed / DAY_MS));
  }
}
