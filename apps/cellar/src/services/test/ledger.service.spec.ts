import { Test } from '@nestjs/testing';
import { LedgerService } from '../../services/ledger.service';
import { TransactionTypeCatalog } from '../../services/transaction-type.catalog';
import { IBatchTransactionRepository } from '../../repositories/ibatchtransaction.repository';
import { IBatchRepository } from '../../repositories/ibatch.repository';
import { ITankRepository } from '../../repositories/itank.repository';
import { CellarErrorKind } from '../../enums/cellar-error-kind.enum';
import { CellarRule } from '../../enums/cellar-rule.enum';
import { makeBatch, makeTank, standardTypes } from './fixtures';

describe('LedgerService', () => {
  let service: LedgerService;

  const transactionRepoMock = {
    create: jest.fn(),
    findByBatchId: jest.fn(),
    findByBatchIdAndType: jest.fn(),
    executeInTransaction: jest.fn((callback: () => Promise<unknown>) => callback()),
  };

  const batchRepoMock = {
    findById: jest.fn(),
    findByIdForUpdate: jest.fn(),
    save: jest.fn(),
  };

  const tankRepoMock = {
    findByIdForUpdate: jest.fn(),
    save: jest.fn(),
  };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        LedgerService,
        { provide: IBatchTransactionRepository, useValue: transactionRepoMock },
        { provide: IBatchRepository, useValue: batchRepoMock },
        { provide: ITankRepository, useValue: tankRepoMock },
        { provide: TransactionTypeCatalog, useValue: TransactionTypeCatalog.of(standardTypes()) },
      ],
    }).compile();

    service = moduleRef.get(LedgerService);
    jest.clearAllMocks();

    transactionRepoMock.create.mockImplementation(async (transaction) => ({ ...transaction, id: 'tx-1' }));
    tankRepoMock.save.mockImplementation(async (tank) => tank);
    batchRepoMock.save.mockImplementation(async (batch) => batch);
  });

  // record
  it('should add to the tank without rounding', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));
    tankRepoMock.findByIdForUpdate.mockResolvedValue(makeTank({ capacity: '2000', currentQuantity: '999.99' }));

    const result = await service.record({ batchId: 'batch-1', transactionTypeId: 1, quantity: '234.567' });

    expect(result).toMatchObject({ id: 'tx-1', batchId: 'batch-1', quantity: '234.567', unitId: 1 });
    expect(tankRepoMock.save).toHaveBeenCalledWith(expect.objectContaining({ currentQuantity: '1234.557' }));
  });

  it('should accept a fill that reaches capacity exactly', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));
    tankRepoMock.findByIdForUpdate.mockResolvedValue(makeTank({ capacity: '100', currentQuantity: '95' }));

    await service.record({ batchId: 'batch-1', transactionTypeId: 1, quantity: '5' });

    expect(tankRepoMock.save).toHaveBeenCalledWith(expect.objectContaining({ currentQuantity: '100' }));
  });

  it('should throw if the fill exceeds capacity', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));
    tankRepoMock.findByIdForUpdate.mockResolvedValue(makeTank({ capacity: '100', currentQuantity: '95' }));

    await expect(
      service.record({ batchId: 'batch-1', transactionTypeId: 1, quantity: '5.01' })
    ).rejects.toThrow('Transaction exceeds tank capacity. Capacity: 100, Resulting quantity: 100.01');

    expect(tankRepoMock.save).not.toHaveBeenCalled();
  });

  it('should accept a removal that empties the tank', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));
    tankRepoMock.findByIdForUpdate.mockResolvedValue(makeTank({ currentQuantity: '5' }));

    await service.record({ batchId: 'batch-1', transactionTypeId: 4, quantity: '5' });

    expect(tankRepoMock.save).toHaveBeenCalledWith(expect.objectContaining({ currentQuantity: '0' }));
  });

  it('should throw if the removal goes below zero', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));
    tankRepoMock.findByIdForUpdate.mockResolvedValue(makeTank({ currentQuantity: '5' }));

    await expect(
      service.record({ batchId: 'batch-1', transactionTypeId: 4, quantity: '5.01' })
    ).rejects.toMatchObject({
      kind: CellarErrorKind.VALIDATION,
      rule: CellarRule.INSUFFICIENT_QUANTITY,
      message: 'Insufficient quantity in tank. Current: 5, Attempted removal: 5.01',
    });
  });

  it('should throw if the batch is completed and record nothing', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({ completedAt: new Date('2026-02-01T00:00:00.000Z') }));

    await expect(
      service.record({ batchId: 'batch-1', transactionTypeId: 1, quantity: '1' })
    ).rejects.toMatchObject({ kind: CellarErrorKind.CONFLICT, message: 'Cannot modify completed batch' });

    expect(transactionRepoMock.create).not.toHaveBeenCalled();
  });

  it('should throw if the batch does not exist', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(null);

    await expect(
      service.record({ batchId: 'missing', transactionTypeId: 1, quantity: '1' })
    ).rejects.toMatchObject({ kind: CellarErrorKind.NOT_FOUND, message: 'Batch not found with id: missing' });
  });

  it('should throw on an unknown transaction type', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));

    await expect(
      service.record({ batchId: 'batch-1', transactionTypeId: 99, quantity: '1' })
    ).rejects.toMatchObject({ rule: CellarRule.INVALID_TRANSACTION_TYPE, message: 'Invalid transaction type: 99' });
  });

  it('should throw on a negative quantity', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));

    await expect(
      service.record({ batchId: 'batch-1', transactionTypeId: 1, quantity: '-3' })
    ).rejects.toMatchObject({ kind: CellarErrorKind.VALIDATION, rule: CellarRule.INVALID_QUANTITY });
  });

  it('should throw on a quantity with more than four decimals and write nothing', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));

    await expect(
      service.record({ batchId: 'batch-1', transactionTypeId: 1, quantity: '0.00005' })
    ).rejects.toMatchObject({ kind: CellarErrorKind.VALIDATION, rule: CellarRule.INVALID_QUANTITY });

    expect(transactionRepoMock.create).not.toHaveBeenCalled();
    expect(tankRepoMock.save).not.toHaveBeenCalled();
  });

  it('should not touch the tank for types that do not move liquid', async () => {
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));

    const entry = await service.apply({ batchId: 'batch-1', transactionTypeId: 5, quantity: '250' });

    expect(entry.tank).toBeNull();
    expect(tankRepoMock.findByIdForUpdate).not.toHaveBeenCalled();
    expect(entry.transaction.unitId).toBe(4);
  });

  // milestones
  it('should stamp the yeast date on the first addition', async () => {
    const occurredAt = new Date('2026-01-11T09:00:00.000Z');
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({}));

    const entry = await service.apply({ batchId: 'batch-1', transactionTypeId: 5, quantity: '250', occurredAt });

    expect(entry.batch.yeastAddedAt).toEqual(occurredAt);
    expect(batchRepoMock.save).toHaveBeenCalledTimes(1);
  });

  it('should keep the first yeast date on later additions', async () => {
    const first = new Date('2026-01-11T09:00:00.000Z');
    batchRepoMock.findByIdForUpdate.mockResolvedValue(makeBatch({ yeastAddedAt: first }));

    const entry = await service.apply({
      batchId: 'batch-1',
      transactionTypeId: 5,
      quantity: '100',
      occurredAt: new Date('2026-01-12T09:00:00.000Z'),
    });

    expect(entry.batch.yeastAddedAt).toEqual(first);
    expect(batchRepoMock.save).not.toHaveBeenCalled();
  });

  it('should overwrite the stabilizer date when the type keeps the latest', async () => {
    const latest = new Date('2026-01-20T09:00:00.000Z');
    batchRepoMock.findByIdForUpdate.mockResolvedValue(
      makeBatch({ stabilizerAddedAt: new Date('2026-01-15T09:00:00.000Z') })
    );

    const entry = await service.apply({ batchId: 'batch-1', transactionTypeId: 6, quantity: '30', occurredAt: latest });

    expect(entry.batch.stabilizerAddedAt).toEqual(latest);
    expect(batchRepoMock.save).toHaveBeenCalledTimes(1);
  });

  // history
  it('should list the history of a batch', async () => {
    batchRepoMock.findById.mockResolvedValue(makeBatch({}));
    transactionRepoMock.findByBatchIdAndType.mockResolvedValue([]);

    await service.listByBatchAndType('batch-1', 3);

    expect(transactionRepoMock.findByBatchIdAndType).toHaveBeenCalledWith('batch-1', 3);
  });

  it('should throw when listing an unknown batch', async () => {
    batchRepoMock.findById.mockResolvedValue(null);

    await expect(service.listByBatch('batch-9')).rejects.toThrow('Batch not found with id: batch-9');
  });
});
