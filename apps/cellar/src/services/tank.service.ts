import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Tank } from '../entities/tank.entity';
import { Unit } from '../entities/unit.entity';
import { Batch } from '../entities/batch.entity';
import { BatchTransaction } from '../entities/batch-transaction.entity';
import { TankStatus } from '../enums/tank-status.enum';
import { CellarRule } from '../enums/cellar-rule.enum';
import { ITankRepository } from '../repositories/itank.repository';
import { IUnitRepository } from '../repositories/iunit.repository';
import { IBatchRepository } from '../repositories/ibatch.repository';
import { IBatchTransactionRepository } from '../repositories/ibatchtransaction.repository';
import { ConflictError, NotFoundError, ValidationError } from '../errors/cellar.exception';
import { CELLAR_CONFIG, CellarConfig } from '../config/cellar.config';
import { QuantityInput, formatQuantity, parseQuantity, percentOf, toDecimal } from '../common/quantity';

// url safe, tanks are addressed by label
const LABEL_PATTERN = /^[a-zA-Z0-9_-]+$/;

export interface TankUpdate {
    newLabel?: string;
    newCapacity?: QuantityInput;
}

export interface TankDetails {
    tank: Tank;
    batch: Batch | null;
    transactions: BatchTransaction[];
}

@Injectable()
export class TankService {
    private readonly logger = new Logger(TankService.name);

    constructor(
        private readonly tankRepo: ITankRepository,
        private readonly unitRepo: IUnitRepository,
        private readonly batchRepo: IBatchRepository,
        private readonly transactionRepo: IBatchTransactionRepository,
        @Inject(CELLAR_CONFIG)
        private readonly config: CellarConfig,
    ) {}

    // register a new empty tank
    async create(label: string, capacity: QuantityInput): Promise<Tank> {
        const cleanLabel = this.validateLabel(label);
        const cleanCapacity = this.validateCapacity(capacity);

        return await this.tankRepo.executeInTransaction(async () => {
            // soft deleted tanks keep their label
            if (await this.tankRepo.existsByLabel(cleanLabel)) {
                throw new ConflictError(
                    CellarRule.DUPLICATE_LABEL,
                    `Tank with label '${cleanLabel}' already exists`,
                    { label: cleanLabel },
                );
            }

            const unit = await this.resolveCapacityUnit();

            const tank = new Tank();
            tank.label = cleanLabel;
            tank.capacity = formatQuantity(cleanCapacity);
            tank.currentQuantity = '0';
            tank.capacityUnitId = unit.id;
            tank.currentBatchId = null;
            tank.status = TankStatus.ACTIVE;
            tank.deletedAt = null;

            const saved = await this.tankRepo.create(tank);
            this.logger.log(`Created tank ${saved.label} with capacity ${tank.capacity} ${unit.abbreviation}`);
            return saved;
        });
    }

    // includes soft deleted tanks, for administration
    async getById(tankId: string): Promise<Tank> {
        const tank = await this.tankRepo.findById(tankId);
        if (!tank) {
            throw new NotFoundError('Tank', tankId);
        }
        return tank;
    }

    async getByLabel(label: string): Promise<Tank> {
        const tank = await this.tankRepo.findByLabel(label);
        if (!tank) {
            throw new NotFoundError('Tank', label, 'label');
        }
        return tank;
    }

    async update(label: string, changes: TankUpdate): Promise<Tank> {
        return await this.tankRepo.executeInTransaction(async () => {
            const found = await this.getByLabel(label);
            const tank = await this.tankRepo.findByIdForUpdate(found.id);
            if (!tank) {
                throw new NotFoundError('Tank', label, 'label');
            }

            if (changes.newLabel !== undefined && changes.newLabel.trim() !== tank.label) {
                const newLabel = this.validateLabel(changes.newLabel);
                if (await this.tankRepo.existsByLabel(newLabel)) {
                    throw new ConflictError(
                        CellarRule.DUPLICATE_LABEL,
                        `Tank with label '${newLabel}' already exists`,
                        { label: newLabel },
                    );
                }
                tank.label = newLabel;
            }

            if (changes.newCapacity !== undefined) {
                const newCapacity = this.validateCapacity(changes.newCapacity);
                const current = toDecimal(tank.currentQuantity);

                // cannot shrink below what is in the tank
                if (newCapacity.lessThan(current)) {
                    throw new ValidationError(
                        CellarRule.CAPACITY_BELOW_CONTENTS,
                        `New capacity ${formatQuantity(newCapacity)} is below the current quantity ${formatQuantity(current)} of tank ${tank.label}`,
                        { tankId: tank.id, capacity: formatQuantity(newCapacity), currentQuantity: formatQuantity(current) },
                    );
                }
                tank.capacity = formatQuantity(newCapacity);
            }

            const saved = await this.tankRepo.save(tank);
            this.logger.log(`Updated tank ${label} (now ${saved.label}, capacity ${saved.capacity})`);
            return saved;
        });
    }

    async softDelete(label: string): Promise<Tank> {
        return await this.tankRepo.executeInTransaction(async () => {
            const tank = await this.findForStatusChange(label);
            if (tank.status === TankStatus.DELETED) {
                throw new ConflictError(
                    CellarRule.TANK_ALREADY_DELETED,
                    `Tank ${label} is already deleted`,
                    { tankId: tank.id },
                );
            }

            tank.status = TankStatus.DELETED;
            tank.deletedAt = new Date();

            const saved = await this.tankRepo.save(tank);
            this.logger.log(`Soft deleted tank ${label}`);
            return saved;
        });
    }

    async restore(label: string): Promise<Tank> {
        return await this.tankRepo.executeInTransaction(async () => {
            const tank = await this.findForStatusChange(label);
            if (tank.status !== TankStatus.DELETED) {
                throw new ConflictError(
                    CellarRule.TANK_NOT_DELETED,
                    `Tank ${label} is not deleted`,
                    { tankId: tank.id },
                );
            }

            tank.status = TankStatus.ACTIVE;
            tank.deletedAt = null;

            const saved = await this.tankRepo.save(tank);
            this.logger.log(`Restored tank ${label}`);
            return saved;
        });
    }

    async listAll(): Promise<Tank[]> {
        return await this.tankRepo.findAll();
    }

    async listAllIncludingDeleted(): Promise<Tank[]> {
        return await this.tankRepo.findAllIncludingDeleted();
    }

    async listDeleted(): Promise<Tank[]> {
        return await this.tankRepo.findDeleted();
    }

    // tanks a new batch can be started in
    async listAvailable(): Promise<Tank[]> {
        return await this.tankRepo.findByOccupancy(false);
    }

    async listOccupied(): Promise<Tank[]> {
        return await this.tankRepo.findByOccupancy(true);
    }

    async listLowCapacity(thresholdPercent: number = this.config.lowCapacityPercent): Promise<Tank[]> {
        const occupied = await this.tankRepo.findByOccupancy(true);
        return occupied.filter((tank) => isLowCapacity(tank, thresholdPercent));
    }

    async listVolumeUnits(): Promise<Unit[]> {
        return await this.unitRepo.findByVolumeFlag(true);
    }

    // tank, its active batch and that batch's history
    async getDetails(label: string): Promise<TankDetails> {
        const tank = await this.getByLabel(label);
        if (!tank.currentBatchId) {
            return { tank, batch: null, transactions: [] };
        }

        const [batch, transactions] = await Promise.all([
            this.batchRepo.findById(tank.currentBatchId),
            this.transactionRepo.findByBatchId(tank.currentBatchId),
        ]);

        return { tank, batch, transactions: batch ? transactions : [] };
    }

    // helpers private methods
    private async findForStatusChange(label: string): Promise<Tank> {
        const found = await this.tankRepo.findByLabelIncludingDeleted(label);
        if (!found) {
            throw new NotFoundError('Tank', label, 'label');
        }
        const tank = await this.tankRepo.findByIdForUpdate(found.id);
        if (!tank) {
            throw new NotFoundError('Tank', label, 'label');
        }
        return tank;
    }

    private async resolveCapacityUnit(): Promise<Unit> {
        const abbreviation = this.config.canonicalVolumeUnit;
        const unit = await this.unitRepo.findByAbbreviation(abbreviation);

        if (!unit || !unit.isVolume) {
            throw new ValidationError(
                CellarRule.INVALID_CAPACITY_UNIT,
                `Tank capacity must use a volume unit, '${abbreviation}' is not one`,
                { abbreviation },
            );
        }
        return unit;
    }

    private validateLabel(label: string): string {
        const clean = label.trim();
        if (!LABEL_PATTERN.test(clean) || clean.length > 100) {
            throw new ValidationError(
                CellarRule.INVALID_LABEL,
                'Tank label must contain only letters, numbers, hyphens and underscores',
                { label },
            );
        }
        return clean;
    }

    private validateCapacity(capacity: QuantityInput): Decimal {
        const value = parseQuantity(capacity, 'capacity');
        if (value.isZero()) {
            throw new ValidationError(
                CellarRule.INVALID_CAPACITY,
                'Capacity must be greater than 0',
                { capacity: String(capacity) },
            );
        }
        return value;
    }
}

export function isLowCapacity(tank: Tank, thresholdPercent: number): boolean {
    if (toDecimal(tank.capacity).isZero()) {
        return false;
    }
    return new Decimal(percentOf(tank.currentQuantity, tank.capacity)).lessThan(thresholdPercent);
}
