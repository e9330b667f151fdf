import { TransactionType } from '../entities/transaction-type.entity';

export abstract class ITransactionTypeRepository {
  abstract findAll(): Promise<TransactionType[]>;
  abstract findByName(name: string): Promise<TransactionType | null>;
  abstract save(transactionType: TransactionType): Promise<TransactionType>;

  abstract executeInTransaction<T>(callback: () => Promise<T>): Promise<T>;
}
