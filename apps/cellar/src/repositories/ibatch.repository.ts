import { Batch } from '../entities/batch.entity';

export abstract class IBatchRepository {
  // basic crud methods
  abstract create(batch: Batch): Promise<Batch>;
  abstract save(batch: Batch): Promise<Batch>;
  abstract findById(batchId: string): Promise<Batch | null>;
  abstract findByIdForUpdate(batchId: string): Promise<Batch | null>;

  // query methods
  abstract findActive(): Promise<Batch[]>;
  abstract findCompleted(): Promise<Batch[]>;

  abstract executeInTransaction<T>(callback: () => Promise<T>): Promise<T>;
}
