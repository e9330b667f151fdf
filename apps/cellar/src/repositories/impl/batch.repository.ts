import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import { IBatchRepository } from '../ibatch.repository';
import { Batch } from '../../entities/batch.entity';
import { TransactionContext } from './transaction.context';

@Injectable()
export class BatchRepository extends IBatchRepository {
    constructor(
        @InjectRepository(Batch)
        private readonly repo: Repository<Batch>,
        private readonly context: TransactionContext,
    ) {
        super();
    }

    async create(batch: Batch): Promise<Batch> {
        const repo = this.getRepo();
        const newBatch = repo.create(batch);
        return await repo.save(newBatch);
    }

    async save(batch: Batch): Promise<Batch> {
        return await this.getRepo().save(batch);
    }

    async findById(batchId: string): Promise<Batch | null> {
        return await this.getRepo().findOne({
            where: { id: batchId },
        });
    }

    async findByIdForUpdate(batchId: string): Promise<Batch | null> {
        return await this.getRepo().findOne({
            where: { id: batchId },
            lock: { mode: 'pessimistic_write' },
        });
    }

    async findActive(): Promise<Batch[]> {
        return await this.getRepo().find({
            where: { completedAt: IsNull() },
            order: { startedAt: 'ASC' },
        });
    }

    async findCompleted(): Promise<Batch[]> {
        return await this.getRepo().find({
            where: { completedAt: Not(IsNull()) },
            order: { completedAt: 'DESC' },
        });
    }

    async executeInTransaction<T>(callback: () => Promise<T>): Promise<T> {
        return await this.context.run(callback);
    }

    private getRepo(): Repository<Batch> {
        return this.context.manager ? this.context.manager.getRepository(Batch) : this.repo;
    }
}
