import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { IBatchTransactionRepository } from '../ibatchtransaction.repository';
import { BatchTransaction } from '../../entities/batch-transaction.entity';
import { TransactionContext } from './transaction.context';

@Injectable()
export class BatchTransactionRepository extends IBatchTransactionRepository {
    constructor(
        @InjectRepository(BatchTransaction)
        private readonly repo: Repository<BatchTransaction>,
        private readonly context: TransactionContext,
    ) {
        super();
    }

    async create(transaction: BatchTransaction): Promise<BatchTransaction> {
        const repo = this.getRepo();
        const newTransaction = repo.create(transaction);
        return await repo.save(newTransaction);
    }

    async findByBatchId(batchId: string): Promise<BatchTransaction[]> {
        return await this.getRepo().find({
            where: { batchId },
            order: { occurredAt: 'DESC', createdAt: 'DESC' },
        });
    }

    async findByBatchIdAndType(batchId: string, transactionTypeId: number): Promise<BatchTransaction[]> {
        return await this.getRepo().find({
            where: { batchId, transactionTypeId },
            order: { occurredAt: 'DESC', createdAt: 'DESC' },
        });
    }

    async executeInTransaction<T>(callback: () => Promise<T>): Promise<T> {
        return await this.context.run(callback);
    }

    private getRepo(): Repository<BatchTransaction> {
        return this.context.manager ? this.context.manager.getRepository(BatchTransaction) : this.repo;
    }
}
