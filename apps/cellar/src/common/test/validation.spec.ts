import { ValidationError as FieldError } from 'class-validator';
import { createUuidPipe, toValidationError } from '../validation';
import { CellarErrorKind } from '../../enums/cellar-error-kind.enum';
import { CellarRule } from '../../enums/cellar-rule.enum';

const fieldError = (property: string, constraints: Record<string, string>): FieldError =>
  Object.assign(new FieldError(), { property, constraints, children: [] });

describe('toValidationError', () => {
  it('should report every failed constraint', () => {
    const error = toValidationError([
      fieldError('label', { isNotEmpty: 'label should not be empty' }),
      fieldError('capacity', { matches: 'capacity must be a non-negative decimal number' }),
    ]);

    expect(error.getError()).toEqual({
      kind: CellarErrorKind.VALIDATION,
      rule: CellarRule.INVALID_PAYLOAD,
      message: 'label should not be empty; capacity must be a non-negative decimal number',
      context: { fields: 'label,capacity' },
    });
  });

  it('should fall back to a generic message', () => {
    expect(toValidationError([]).message).toBe('Invalid payload');
  });
});

describe('createUuidPipe', () => {
  const pipe = createUuidPipe();

  it('should pass a uuid through', async () => {
    await expect(
      pipe.transform('3f0c2a52-6f4e-4c1b-9d2e-8a7b6c5d4e3f', { type: 'body' })
    ).resolves.toBe('3f0c2a52-6f4e-4c1b-9d2e-8a7b6c5d4e3f');
  });

  it('should reject a malformed id as a validation error', async () => {
    await expect(pipe.transform('batch-1', { type: 'body' })).rejects.toMatchObject({
      kind: CellarErrorKind.VALIDATION,
      rule: CellarRule.INVALID_PAYLOAD,
    });
  });
});
