import { QueryFailedError, TypeORMError } from 'typeorm';
import { translateStorageError } from '../storage-errors';
import { CellarException, InfrastructureError, NotFoundError } from '../cellar.exception';
import { CellarErrorKind } from '../../enums/cellar-error-kind.enum';
import { CellarRule } from '../../enums/cellar-rule.enum';

describe('translateStorageError', () => {
  it('should pass domain errors through unchanged', () => {
    const error = new NotFoundError('Tank', 'tank-1');

    expect(translateStorageError(error)).toBe(error);
  });

  it('should turn a unique violation into a conflict', () => {
    const driverError = Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
    const error = new QueryFailedError('INSERT INTO "tanks"', [], driverError);

    expect(translateStorageError(error)).toMatchObject({
      kind: CellarErrorKind.CONFLICT,
      rule: CellarRule.UNIQUE_VIOLATION,
      message: 'A record with the same unique value already exists',
    });
  });

  it('should turn a numeric overflow into a validation error', () => {
    const driverError = Object.assign(new Error('numeric field overflow'), { code: '22003' });
    const error = new QueryFailedError('INSERT INTO "batch_transactions"', [], driverError);

    expect(translateStorageError(error)).toMatchObject({
      kind: CellarErrorKind.VALIDATION,
      rule: CellarRule.INVALID_QUANTITY,
      message: 'Quantity is out of range for storage',
    });
  });

  it('should turn a malformed uuid into a validation error', () => {
    const driverError = Object.assign(new Error('invalid input syntax for type uuid: "abc"'), { code: '22P02' });
    const error = new QueryFailedError('SELECT * FROM "batches"', [], driverError);

    expect(translateStorageError(error)).toMatchObject({
      kind: CellarErrorKind.VALIDATION,
      rule: CellarRule.INVALID_PAYLOAD,
    });
  });

  it('should turn other typeorm errors into infrastructure failures', () => {
    const cause = new TypeORMError('pool exhausted');

    const translated = translateStorageError(cause);

    expect(translated).toBeInstanceOf(InfrastructureError);
    expect(translated).toMatchObject({
      kind: CellarErrorKind.INFRASTRUCTURE,
      rule: CellarRule.STORAGE_FAILURE,
      message: 'Storage failure: pool exhausted',
    });
    expect(translated instanceof CellarException && translated.cause).toBe(cause);
  });

  it('should treat coded driver errors as infrastructure failures', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });

    expect(translateStorageError(error)).toMatchObject({
      kind: CellarErrorKind.INFRASTRUCTURE,
      message: 'Storage failure: connect ECONNREFUSED 127.0.0.1:5432',
    });
  });

  it('should leave unrelated errors alone', () => {
    const error = new RangeError('bad index');

    expect(translateStorageError(error)).toBe(error);
  });
});

describe('CellarException', () => {
  it('should expose the payload sent to the caller', () => {
    const error = new NotFoundError('Batch', 'batch-9');

    expect(error.name).toBe('NotFoundError');
    expect(error.getError()).toEqual({
      kind: CellarErrorKind.NOT_FOUND,
      rule: CellarRule.ENTITY_NOT_FOUND,
      message: 'Batch not found with id: batch-9',
      context: { entity: 'Batch', id: 'batch-9' },
    });
  });
});
