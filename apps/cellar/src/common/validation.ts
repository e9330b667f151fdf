import { ParseUUIDPipe, ValidationPipe } from '@nestjs/common';
import { ValidationError as FieldError } from 'class-validator';
import { ValidationError } from '../errors/cellar.exception';
import { CellarRule } from '../enums/cellar-rule.enum';

// payload errors reach the caller in the same shape as domain validation errors
export function toValidationError(errors: FieldError[]): ValidationError {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    return new ValidationError(
        CellarRule.INVALID_PAYLOAD,
        messages.length > 0 ? messages.join('; ') : 'Invalid payload',
        { fields: errors.map((error) => error.property).join(',') },
    );
}

export function createValidationPipe(): ValidationPipe {
    return new ValidationPipe({
        whitelist: true,
        transform: true,
        exceptionFactory: toValidationError,
    });
}

// bare id payloads skip the ValidationPipe
export function createUuidPipe(): ParseUUIDPipe {
    return new ParseUUIDPipe({
        exceptionFactory: (message: string) => new ValidationError(CellarRule.INVALID_PAYLOAD, message),
    });
}
