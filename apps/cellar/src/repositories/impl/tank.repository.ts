import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import { ITankRepository } from '../itank.repository';
import { Tank } from '../../entities/tank.entity';
import { TankStatus } from '../../enums/tank-status.enum';
import { TransactionContext } from './transaction.context';

@Injectable()
export class TankRepository extends ITankRepository {
    constructor(
        @InjectRepository(Tank)
        private readonly repo: Repository<Tank>,
        private readonly context: TransactionContext,
    ) {
        super();
    }

    async create(tank: Tank): Promise<Tank> {
        const repo = this.getRepo();
        const newTank = repo.create(tank);
        return await repo.save(newTank);
    }

    async save(tank: Tank): Promise<Tank> {
        return await this.getRepo().save(tank);
    }

    async findById(tankId: string): Promise<Tank | null> {
        return await this.getRepo().findOne({
            where: { id: tankId },
        });
    }

    async findByIdForUpdate(tankId: string): Promise<Tank | null> {
        return await this.getRepo().findOne({
            where: { id: tankId },
            lock: { mode: 'pessimistic_write' },
        });
    }

    async findByLabel(label: string): Promise<Tank | null> {
        return await this.getRepo().findOne({
            where: { label, status: TankStatus.ACTIVE },
        });
    }

    async findByLabelIncludingDeleted(label: string): Promise<Tank | null> {
        return await this.getRepo().findOne({
            where: { label },
        });
    }

    async existsByLabel(label: string): Promise<boolean> {
        return await this.getRepo().exists({
            where: { label },
        });
    }

    async findAll(): Promise<Tank[]> {
        return await this.getRepo().find({
            where: { status: TankStatus.ACTIVE },
            order: { label: 'ASC' },
        });
    }

    async findAllIncludingDeleted(): Promise<Tank[]> {
        return await this.getRepo().find({
            order: { label: 'ASC' },
        });
    }

    async findDeleted(): Promise<Tank[]> {
        return await this.getRepo().find({
            where: { status: TankStatus.DELETED },
            order: { deletedAt: 'DESC' },
        });
    }

    async findByOccupancy(occupied: boolean): Promise<Tank[]> {
        return await this.getRepo().find({
            where: {
                status: TankStatus.ACTIVE,
                currentBatchId: occupied ? Not(IsNull()) : IsNull(),
            },
            order: { label: 'ASC' },
        });
    }

    async executeInTransaction<T>(callback: () => Promise<T>): Promise<T> {
        return await this.context.run(callback);
    }

    private getRepo(): Repository<Tank> {
        return this.context.manager ? this.context.manager.getRepository(Tank) : this.repo;
    }
}
