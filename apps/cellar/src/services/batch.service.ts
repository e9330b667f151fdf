import { Injectable, Logger } from '@nestjs/common';
import { Batch } from '../entities/batch.entity';
import { TankStatus } from '../enums/tank-status.enum';
import { TransactionSystemRole } from '../enums/transaction-system-role.enum';
import { CellarRule } from '../enums/cellar-rule.enum';
import { IBatchRepository } from '../repositories/ibatch.repository';
import { ITankRepository } from '../repositories/itank.repository';
import { ConflictError, NotFoundError, ValidationError } from '../errors/cellar.exception';
import { LedgerService } from './ledger.service';
import { TransactionTypeCatalog } from './transaction-type.catalog';
import { QuantityInput, toDecimal } from '../common/quantity';

export interface StartBatchInput {
    tankId: string;
    batchName: string;
    transactionTypeId: number;
    initialQuantity: QuantityInput;
    note?: string | null;
    startedAt?: Date;
    actorId?: string | null;
}

export const AUTO_WASTE_NOTE = 'Auto-generated waste at batch completion';

@Injectable()
export class BatchService {
    private readonly logger = new Logger(BatchService.name);

    constructor(
        private readonly repo: IBatchRepository,
        private readonly tankRepo: ITankRepository,
        private readonly ledgerService: LedgerService,
        private readonly catalog: TransactionTypeCatalog,
    ) {}

    // create a batch together with its opening transaction
    async start(input: StartBatchInput): Promise<Batch> {
        return await this.repo.executeInTransaction(async () => {
            // 1. tank must be empty
            const tank = await this.tankRepo.findByIdForUpdate(input.tankId);
            if (!tank) {
                throw new NotFoundError('Tank', input.tankId);
            }
            if (tank.status === TankStatus.DELETED) {
                throw new ValidationError(
                    CellarRule.TANK_DELETED,
                    `Tank ${tank.label} is deleted`,
                    { tankId: tank.id },
                );
            }
            if (tank.currentBatchId !== null) {
                throw new ConflictError(
                    CellarRule.TANK_OCCUPIED,
                    `Tank ${tank.label} already has an active batch`,
                    { tankId: tank.id, currentBatchId: tank.currentBatchId },
                );
            }

            // 2. create batch
            const startedAt = input.startedAt ?? new Date();

            const batch = new Batch();
            batch.tankId = tank.id;
            batch.name = input.batchName.trim();
            batch.startedAt = startedAt;
            batch.yeastAddedAt = null;
            batch.stabilizerAddedAt = null;
            batch.completedAt = null;

            const savedBatch = await this.repo.create(batch);

            // 3. opening transaction, capacity is checked here
            const entry = await this.ledgerService.apply({
                batchId: savedBatch.id,
                transactionTypeId: input.transactionTypeId,
                quantity: input.initialQuantity,
                occurredAt: startedAt,
                actorId: input.actorId,
                note: input.note,
            });

            // 4. occupy the tank
            const occupied = entry.tank ?? tank;
            occupied.currentBatchId = savedBatch.id;
            await this.tankRepo.save(occupied);

            this.logger.log(`Started batch "${entry.batch.name}" (${entry.batch.id}) in tank ${tank.label}`);
            return entry.batch;
        });
    }

    async complete(batchId: string): Promise<Batch> {
        return await this.repo.executeInTransaction(async () => {
            // 1. batch must be active
            let batch = await this.repo.findByIdForUpdate(batchId);
            if (!batch) {
                throw new NotFoundError('Batch', batchId);
            }
            if (batch.completedAt !== null) {
                throw new ConflictError(
                    CellarRule.BATCH_COMPLETED,
                    'Batch is already completed',
                    { batchId },
                );
            }

            let tank = await this.tankRepo.findByIdForUpdate(batch.tankId);
            if (!tank) {
                throw new NotFoundError('Tank', batch.tankId);
            }
            const ownsTank = tank.currentBatchId === batch.id;

            // 2. whatever is left was lost without being recorded
            const remaining = toDecimal(tank.currentQuantity);
            if (ownsTank && remaining.greaterThan(0)) {
                const waste = this.catalog.bySystemRole(TransactionSystemRole.WASTE);
                const entry = await this.ledgerService.apply({
                    batchId: batch.id,
                    transactionTypeId: waste.id,
                    quantity: tank.currentQuantity,
                    note: AUTO_WASTE_NOTE,
                });
                batch = entry.batch;
                tank = entry.tank ?? tank;
                this.logger.log(`Wrote off ${tank.label} remainder of ${remaining.toFixed()} as waste`);
            }

            // 3. mark complete
            batch.completedAt = new Date();
            const completed = await this.repo.save(batch);

            // 4. release the tank
            if (ownsTank) {
                tank.currentBatchId = null;
                tank.currentQuantity = '0';
                await this.tankRepo.save(tank);
            }

            this.logger.log(`Completed batch "${completed.name}" (${completed.id})`);
            return completed;
        });
    }

    async getById(batchId: string): Promise<Batch> {
        const batch = await this.repo.findById(batchId);
        if (!batch) {
            throw new NotFoundError('Batch', batchId);
        }
        return batch;
    }

    async listActive(): Promise<Batch[]> {
        return await this.repo.findActive();
    }

    // newest completion first
    async listCompleted(): Promise<Batch[]> {
        return await this.repo.findCompleted();
    }
}
