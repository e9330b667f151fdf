import { Injectable, Logger } from '@nestjs/common';
import { Tank } from '../entities/tank.entity';
import { Batch } from '../entities/batch.entity';
import { BatchTransaction } from '../entities/batch-transaction.entity';
import { TransactionSystemRole } from '../enums/transaction-system-role.enum';
import { CellarRule } from '../enums/cellar-rule.enum';
import { IBatchRepository } from '../repositories/ibatch.repository';
import { ITankRepository } from '../repositories/itank.repository';
import { ConflictError, NotFoundError, ValidationError } from '../errors/cellar.exception';
import { LedgerService } from './ledger.service';
import { BatchService } from './batch.service';
import { TransactionTypeCatalog } from './transaction-type.catalog';
import { formatQuantity, toDecimal } from '../common/quantity';

export interface TransferInput {
    sourceBatchId: string;
    destinationTankLabel: string;
    actorId?: string | null;
    note?: string | null;
}

export interface TransferResult {
    outgoing: BatchTransaction;
    incoming: BatchTransaction;
}

@Injectable()
export class TransferService {
    private readonly logger = new Logger(TransferService.name);

    constructor(
        private readonly batchRepo: IBatchRepository,
        private readonly tankRepo: ITankRepository,
        private readonly ledgerService: LedgerService,
        private readonly batchService: BatchService,
        private readonly catalog: TransactionTypeCatalog,
    ) {}

    /**
     * Moves the whole content of the source batch's tank into the active
     * batch of another tank, then completes the source batch. Both
     * transactions, both tank updates and the completion share one unit of
     * work.
     */
    async transfer(input: TransferInput): Promise<TransferResult> {
        return await this.batchRepo.executeInTransaction(async () => {
            // 1. source batch must be active
            const sourceRef = await this.batchRepo.findById(input.sourceBatchId);
            if (!sourceRef) {
                throw new NotFoundError('Batch', input.sourceBatchId);
            }
            this.assertActive(sourceRef);

            // 2. destination by label
            const destinationRef = await this.tankRepo.findByLabel(input.destinationTankLabel);
            if (!destinationRef) {
                throw new NotFoundError('Tank', input.destinationTankLabel, 'label');
            }
            if (destinationRef.id === sourceRef.tankId) {
                throw new ValidationError(
                    CellarRule.SAME_TANK_TRANSFER,
                    'Cannot transfer a batch into its own tank',
                    { tankId: sourceRef.tankId },
                );
            }

            // transfers feed an existing run, they never start one
            const destinationBatchId = destinationRef.currentBatchId;
            if (destinationBatchId === null) {
                throw this.destinationNotActive(destinationRef);
            }

            // batches before tanks, as the ledger does
            const source = await this.lockBatches(sourceRef.id, destinationBatchId);
            this.assertActive(source);
            const [sourceTank, destinationTank] = await this.lockTanks(source.tankId, destinationRef.id);
            if (destinationTank.currentBatchId !== destinationBatchId) {
                throw this.destinationNotActive(destinationTank);
            }

            const quantity = toDecimal(sourceTank.currentQuantity);
            if (quantity.lessThanOrEqualTo(0)) {
                throw new ValidationError(
                    CellarRule.NOTHING_TO_TRANSFER,
                    `Nothing to transfer, tank ${sourceTank.label} is empty`,
                    { tankId: sourceTank.id },
                );
            }

            // 3. room in the destination
            const resulting = toDecimal(destinationTank.currentQuantity).plus(quantity);
            if (resulting.greaterThan(toDecimal(destinationTank.capacity))) {
                throw new ValidationError(
                    CellarRule.EXCEEDS_CAPACITY,
                    `Transfer exceeds capacity of tank ${destinationTank.label}. Capacity: ${formatQuantity(destinationTank.capacity)}, Resulting quantity: ${formatQuantity(resulting)}`,
                    {
                        tankId: destinationTank.id,
                        capacity: formatQuantity(destinationTank.capacity),
                        resultingQuantity: formatQuantity(resulting),
                    },
                );
            }

            // 4-5. both legs, the ledger moves the liquid
            const transferQuantity = formatQuantity(quantity);
            const occurredAt = new Date();

            const outgoing = await this.ledgerService.record({
                batchId: source.id,
                transactionTypeId: this.catalog.bySystemRole(TransactionSystemRole.TRANSFER_OUT).id,
                quantity: transferQuantity,
                occurredAt,
                actorId: input.actorId,
                note: input.note ?? `Transfer to ${destinationTank.label}`,
                relatedTankId: destinationTank.id,
            });

            const incoming = await this.ledgerService.record({
                batchId: destinationBatchId,
                transactionTypeId: this.catalog.bySystemRole(TransactionSystemRole.TRANSFER_IN).id,
                quantity: transferQuantity,
                occurredAt,
                actorId: input.actorId,
                note: input.note ?? `Transfer from ${sourceTank.label}`,
                relatedTankId: sourceTank.id,
            });

            // 6. source tank is empty now, completion writes no waste
            await this.batchService.complete(source.id);

            this.logger.log(`Transferred ${transferQuantity} from ${sourceTank.label} to ${destinationTank.label}`);
            return { outgoing, incoming };
        });
    }

    private assertActive(batch: Batch): void {
        if (batch.completedAt !== null) {
            throw new ConflictError(
                CellarRule.BATCH_COMPLETED,
                'Cannot transfer from a completed batch',
                { batchId: batch.id },
            );
        }
    }

    private destinationNotActive(tank: Tank): ValidationError {
        return new ValidationError(
            CellarRule.DESTINATION_NOT_ACTIVE,
            `Tank ${tank.label} has no active batch`,
            { tankId: tank.id },
        );
    }

    // both batches in ascending id order, returns the locked source
    private async lockBatches(sourceId: string, destinationId: string): Promise<Batch> {
        let source: Batch | null = null;
        for (const id of [sourceId, destinationId].sort()) {
            const batch = await this.batchRepo.findByIdForUpdate(id);
            if (!batch) {
                throw new NotFoundError('Batch', id);
            }
            if (id === sourceId) {
                source = batch;
            }
        }
        if (!source) {
            throw new NotFoundError('Batch', sourceId);
        }
        return source;
    }

    // tanks are always locked in ascending id order
    private async lockTanks(sourceId: string, destinationId: string): Promise<[Tank, Tank]> {
        const locked = new Map<string, Tank>();
        for (const id of [sourceId, destinationId].sort()) {
            const tank = await this.tankRepo.findByIdForUpdate(id);
            if (!tank) {
                throw new NotFoundError('Tank', id);
            }
            locked.set(id, tank);
        }

        const sourceTank = locked.get(sourceId);
        const destinationTank = locked.get(destinationId);
        if (!sourceTank || !destinationTank) {
            throw new NotFoundError('Tank', sourceTank ? destinationId : sourceId);
        }
        return [sourceTank, destinationTank];
    }
}
