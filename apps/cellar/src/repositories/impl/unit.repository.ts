import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { IUnitRepository } from '../iunit.repository';
import { Unit } from '../../entities/unit.entity';
import { TransactionContext } from './transaction.context';

@Injectable()
export class UnitRepository extends IUnitRepository {
    constructor(
        @InjectRepository(Unit)
        private readonly repo: Repository<Unit>,
        private readonly context: TransactionContext,
    ) {
        super();
    }

    async findByName(name: string): Promise<Unit | null> {
        return await this.getRepo().findOne({ where: { name } });
    }

    async findByAbbreviation(abbreviation: string): Promise<Unit | null> {
        return await this.getRepo().findOne({ where: { abbreviation } });
    }

    async findByVolumeFlag(isVolume: boolean): Promise<Unit[]> {
        return await this.getRepo().find({
            where: { isVolume },
            order: { name: 'ASC' },
        });
    }

    async save(unit: Unit): Promise<Unit> {
        return await this.getRepo().save(unit);
    }

    private getRepo(): Repository<Unit> {
        return this.context.manager ? this.context.manager.getRepository(Unit) : this.repo;
    }
}
