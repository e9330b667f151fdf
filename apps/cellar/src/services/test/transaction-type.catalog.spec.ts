import { TransactionTypeCatalog } from '../../services/transaction-type.catalog';
import { TransactionSystemRole } from '../../enums/transaction-system-role.enum';
import { CellarErrorKind } from '../../enums/cellar-error-kind.enum';
import { CellarRule } from '../../enums/cellar-rule.enum';
import { makeType, standardTypes } from './fixtures';

describe('TransactionTypeCatalog', () => {
  it('should load every type from the repository once', async () => {
    const repository = {
      findAll: jest.fn().mockResolvedValue(standardTypes()),
      findByName: jest.fn(),
      save: jest.fn(),
      executeInTransaction: jest.fn(),
    };

    const catalog = await TransactionTypeCatalog.load(repository);

    expect(repository.findAll).toHaveBeenCalledTimes(1);
    expect(catalog.size).toBe(6);
    expect(catalog.get(4)?.name).toBe('Sample');
  });

  it('should report an invalid type when the store is empty', () => {
    const catalog = TransactionTypeCatalog.of([]);

    expect(catalog.get(1)).toBeUndefined();
    expect(() => catalog.require(1)).toThrow('Invalid transaction type: 1');
    expect(catalog.list()).toEqual([]);
  });

  it('should reject an unknown id as a validation failure', () => {
    const catalog = TransactionTypeCatalog.of(standardTypes());

    let thrown: unknown;
    try {
      catalog.require(42);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({
      kind: CellarErrorKind.VALIDATION,
      rule: CellarRule.INVALID_TRANSACTION_TYPE,
      context: { transactionTypeId: 42 },
    });
  });

  it('should not follow changes to the loaded entities', () => {
    const waste = makeType({ id: 3, name: 'Waste', quantityMultiplier: -1 });
    const catalog = TransactionTypeCatalog.of([waste]);

    waste.quantityMultiplier = 1;

    expect(catalog.require(3).quantityMultiplier).toBe(-1);
    expect(Object.isFrozen(catalog.require(3))).toBe(true);
    expect(Object.isFrozen(catalog)).toBe(true);
  });

  it('should find types by name and by system role', () => {
    const catalog = TransactionTypeCatalog.of(standardTypes());

    expect(catalog.findByName('Yeast Addition')?.id).toBe(5);
    expect(catalog.findByName('Dry Hop')).toBeUndefined();
    expect(catalog.bySystemRole(TransactionSystemRole.WASTE).id).toBe(3);
  });

  it('should throw when no type carries a system role', () => {
    const catalog = TransactionTypeCatalog.of([makeType({ id: 1 })]);

    expect(() => catalog.bySystemRole(TransactionSystemRole.TRANSFER_OUT))
      .toThrow('No transaction type is configured for TRANSFER_OUT');
  });
});
