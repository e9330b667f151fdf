import { Injectable, Logger } from '@nestjs/common';
import referenceData from '../seeds/reference-data.json';
import { Unit } from '../entities/unit.entity';
import { TransactionType } from '../entities/transaction-type.entity';
import { BatchMilestone } from '../enums/batch-milestone.enum';
import { MilestonePolicy } from '../enums/milestone-policy.enum';
import { TransactionSystemRole } from '../enums/transaction-system-role.enum';
import { IUnitRepository } from '../repositories/iunit.repository';
import { ITransactionTypeRepository } from '../repositories/itransactiontype.repository';

interface UnitSeed {
    name: string;
    abbreviation: string;
    isVolume: boolean;
}

interface TransactionTypeSeed {
    name: string;
    description: string;
    unit: string;
    affectsTankQuantity: boolean;
    quantityMultiplier: number;
    systemRole?: string;
    milestone?: string;
    milestonePolicy?: string;
}

export interface ReferenceData {
    units: UnitSeed[];
    transactionTypes: TransactionTypeSeed[];
}

const isSystemRole = (value: string): value is TransactionSystemRole =>
    Object.values<string>(TransactionSystemRole).includes(value);

const isMilestone = (value: string): value is BatchMilestone =>
    Object.values<string>(BatchMilestone).includes(value);

const isMilestonePolicy = (value: string): value is MilestonePolicy =>
    Object.values<string>(MilestonePolicy).includes(value);

/**
 * Inserts the standard units and transaction types that are missing.
 * Rows that already exist are left as they are.
 */
@Injectable()
export class ReferenceDataSeeder {
    private readonly logger = new Logger(ReferenceDataSeeder.name);

    constructor(
        private readonly unitRepo: IUnitRepository,
        private readonly typeRepo: ITransactionTypeRepository,
    ) {}

    async seed(data: ReferenceData = referenceData): Promise<void> {
        await this.typeRepo.executeInTransaction(async () => {
            const unitsByAbbreviation = new Map<string, Unit>();

            for (const seed of data.units) {
                let unit = await this.unitRepo.findByName(seed.name);
                if (!unit) {
                    const newUnit = new Unit();
                    newUnit.name = seed.name;
                    newUnit.abbreviation = seed.abbreviation;
                    newUnit.isVolume = seed.isVolume;
                    unit = await this.unitRepo.save(newUnit);
                    this.logger.log(`Seeded unit ${unit.name}`);
                }
                unitsByAbbreviation.set(unit.abbreviation, unit);
            }

            for (const seed of data.transactionTypes) {
                if (await this.typeRepo.findByName(seed.name)) continue;

                const unit = unitsByAbbreviation.get(seed.unit) ?? await this.unitRepo.findByAbbreviation(seed.unit);
                if (!unit) {
                    throw new Error(`Reference data: unknown unit "${seed.unit}" for transaction type "${seed.name}"`);
                }

                const type = new TransactionType();
                type.name = seed.name;
                type.description = seed.description;
                type.unitId = unit.id;
                type.affectsTankQuantity = seed.affectsTankQuantity;
                type.quantityMultiplier = this.parseMultiplier(seed);
                type.systemRole = this.parseOptional(seed.systemRole, isSystemRole, seed.name);
                type.milestone = this.parseOptional(seed.milestone, isMilestone, seed.name);
                type.milestonePolicy = this.parseOptional(seed.milestonePolicy, isMilestonePolicy, seed.name)
                    ?? MilestonePolicy.FIRST_OCCURRENCE;

                await this.typeRepo.save(type);
                this.logger.log(`Seeded transaction type ${type.name}`);
            }
        });
    }

    private parseMultiplier(seed: TransactionTypeSeed): number {
        if (![-1, 0, 1].includes(seed.quantityMultiplier)) {
            throw new Error(`Reference data: invalid quantity multiplier ${seed.quantityMultiplier} for "${seed.name}"`);
        }
        return seed.quantityMultiplier;
    }

    private parseOptional<T extends string>(value: string | undefined, guard: (value: string) => value is T, typeName: string): T | null {
        if (value === undefined) return null;
        if (!guard(value)) {
            throw new Error(`Reference data: invalid value "${value}" for "${typeName}"`);
        }
        return value;
    }
}
