import { BatchTransaction } from '../entities/batch-transaction.entity';

export abstract class IBatchTransactionRepository {
  abstract create(transaction: BatchTransaction): Promise<BatchTransaction>;

  // newest first
  abstract findByBatchId(batchId: string): Promise<BatchTransaction[]>;
  abstract findByBatchIdAndType(batchId: string, transactionTypeId: number): Promise<BatchTransaction[]>;

  abstract executeInTransaction<T>(callback: () => Promise<T>): Promise<T>;
}
