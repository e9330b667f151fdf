import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ITransactionTypeRepository } from '../itransactiontype.repository';
import { TransactionType } from '../../entities/transaction-type.entity';
import { TransactionContext } from './transaction.context';

@Injectable()
export class TransactionTypeRepository extends ITransactionTypeRepository {
    constructor(
        @InjectRepository(TransactionType)
        private readonly repo: Repository<TransactionType>,
        private readonly context: TransactionContext,
    ) {
        super();
    }

    async findAll(): Promise<TransactionType[]> {
        return await this.getRepo().find({ order: { id: 'ASC' } });
    }

    async findByName(name: string): Promise<TransactionType | null> {
        return await this.getRepo().findOne({ where: { name } });
    }

    async save(transactionType: TransactionType): Promise<TransactionType> {
        return await this.getRepo().save(transactionType);
    }

    async executeInTransaction<T>(callback: () => Promise<T>): Promise<T> {
        return await this.context.run(callback);
    }

    private getRepo(): Repository<TransactionType> {
        return this.context.manager ? this.context.manager.getRepository(TransactionType) : this.repo;
    }
}
