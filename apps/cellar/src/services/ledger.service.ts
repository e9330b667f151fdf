import { Injectable, Logger } from '@nestjs/common';
import { Batch } from '../entities/batch.entity';
import { Tank } from '../entities/tank.entity';
import { BatchTransaction } from '../entities/batch-transaction.entity';
import { TransactionType } from '../entities/transaction-type.entity';
import { BatchMilestone } from '../enums/batch-milestone.enum';
import { MilestonePolicy } from '../enums/milestone-policy.enum';
import { CellarRule } from '../enums/cellar-rule.enum';
import { IBatchRepository } from '../repositories/ibatch.repository';
import { ITankRepository } from '../repositories/itank.repository';
import { IBatchTransactionRepository } from '../repositories/ibatchtransaction.repository';
import { ConflictError, NotFoundError, ValidationError } from '../errors/cellar.exception';
import { TransactionTypeCatalog } from './transaction-type.catalog';
import { QuantityInput, formatQuantity, parseQuantity, toDecimal } from '../common/quantity';

export interface RecordTransactionInput {
    batchId: string;
    transactionTypeId: number;
    quantity: QuantityInput;
    occurredAt?: Date;
    actorId?: string | null;
    note?: string | null;
    relatedTankId?: string | null;
}

// everything one ledger write touched
export interface LedgerEntry {
    transaction: BatchTransaction;
    batch: Batch;
    // null when the type does not move liquid
    tank: Tank | null;
}

@Injectable()
export class LedgerService {
    private readonly logger = new Logger(LedgerService.name);

    constructor(
        private readonly transactionRepo: IBatchTransactionRepository,
        private readonly batchRepo: IBatchRepository,
        private readonly tankRepo: ITankRepository,
        private readonly catalog: TransactionTypeCatalog,
    ) {}

    async record(input: RecordTransactionInput): Promise<BatchTransaction> {
        const entry = await this.apply(input);
        return entry.transaction;
    }

    /**
     * Validates and applies one event against a batch and its tank.
     * Joins the caller's unit of work when there is one, so batch start,
     * completion and transfers commit or roll back as a whole.
     */
    async apply(input: RecordTransactionInput): Promise<LedgerEntry> {
        return await this.transactionRepo.executeInTransaction(async () => {
            // 1. batch must exist and still be active
            const batch = await this.batchRepo.findByIdForUpdate(input.batchId);
            if (!batch) {
                throw new NotFoundError('Batch', input.batchId);
            }
            if (batch.completedAt !== null) {
                throw new ConflictError(
                    CellarRule.BATCH_COMPLETED,
                    'Cannot modify completed batch',
                    { batchId: batch.id },
                );
            }

            // 2. type comes from the startup catalog
            const type = this.catalog.require(input.transactionTypeId);
            const quantity = parseQuantity(input.quantity);
            const occurredAt = input.occurredAt ?? new Date();

            // 3. every valid event is recorded, even the ones with no effect
            const transaction = new BatchTransaction();
            transaction.batchId = batch.id;
            transaction.transactionTypeId = type.id;
            transaction.quantity = formatQuantity(quantity);
            transaction.unitId = type.unitId;
            transaction.occurredAt = occurredAt;
            transaction.actorId = input.actorId ?? null;
            transaction.note = input.note ?? null;
            transaction.relatedTankId = input.relatedTankId ?? null;

            const savedTransaction = await this.transactionRepo.create(transaction);

            // 4. move liquid
            let tank: Tank | null = null;
            if (type.affectsTankQuantity) {
                tank = await this.applyToTank(batch, type, transaction.quantity);
            }

            // 5. milestone dates
            const savedBatch = await this.stampMilestone(batch, type, occurredAt);

            return { transaction: savedTransaction, batch: savedBatch, tank };
        });
    }

    async listByBatch(batchId: string): Promise<BatchTransaction[]> {
        await this.requireBatch(batchId);
        return await this.transactionRepo.findByBatchId(batchId);
    }

    async listByBatchAndType(batchId: string, transactionTypeId: number): Promise<BatchTransaction[]> {
        await this.requireBatch(batchId);
        return await this.transactionRepo.findByBatchIdAndType(batchId, transactionTypeId);
    }

    listTypes(): Readonly<TransactionType>[] {
        return this.catalog.list();
    }

    // helpers private methods
    private async applyToTank(batch: Batch, type: Readonly<TransactionType>, quantity: string): Promise<Tank> {
        const tank = await this.tankRepo.findByIdForUpdate(batch.tankId);
        if (!tank) {
            throw new NotFoundError('Tank', batch.tankId);
        }

        const current = toDecimal(tank.currentQuantity);
        const capacity = toDecimal(tank.capacity);
        const adjustment = toDecimal(quantity).times(type.quantityMultiplier);
        const newQuantity = current.plus(adjustment);

        // both bounds are inclusive
        if (newQuantity.lessThan(0)) {
            this.logger.warn(`Rejected ${type.name} of ${quantity} on tank ${tank.label}: insufficient quantity`);
            throw new ValidationError(
                CellarRule.INSUFFICIENT_QUANTITY,
                `Insufficient quantity in tank. Current: ${formatQuantity(current)}, Attempted removal: ${quantity}`,
                { tankId: tank.id, currentQuantity: formatQuantity(current), quantity },
            );
        }
        if (newQuantity.greaterThan(capacity)) {
            this.logger.warn(`Rejected ${type.name} of ${quantity} on tank ${tank.label}: exceeds capacity`);
            throw new ValidationError(
                CellarRule.EXCEEDS_CAPACITY,
                `Transaction exceeds tank capacity. Capacity: ${formatQuantity(capacity)}, Resulting quantity: ${formatQuantity(newQuantity)}`,
                { tankId: tank.id, capacity: formatQuantity(capacity), resultingQuantity: formatQuantity(newQuantity) },
            );
        }

        tank.currentQuantity = formatQuantity(newQuantity);
        return await this.tankRepo.save(tank);
    }

    private async stampMilestone(batch: Batch, type: Readonly<TransactionType>, occurredAt: Date): Promise<Batch> {
        if (type.milestone === null) {
            return batch;
        }

        const field = type.milestone === BatchMilestone.YEAST ? 'yeastAddedAt' : 'stabilizerAddedAt';
        const alreadySet = batch[field] !== null;

        if (alreadySet && type.milestonePolicy === MilestonePolicy.FIRST_OCCURRENCE) {
            return batch;
        }

        batch[field] = occurredAt;
        return await this.batchRepo.save(batch);
    }

    private async requireBatch(batchId: string): Promise<Batch> {
        const batch = await this.batchRepo.findById(batchId);
        if (!batch) {
            throw new NotFoundError('Batch', batchId);
        }
        return batch;
    }
}
