import { QueryFailedError, TypeORMError } from 'typeorm';
import { CellarException, ConflictError, InfrastructureError, ValidationError } from './cellar.exception';
import { CellarRule } from '../enums/cellar-rule.enum';

const PG_UNIQUE_VIOLATION = '23505';
const PG_NUMERIC_OUT_OF_RANGE = '22003';
const PG_INVALID_TEXT_REPRESENTATION = '22P02';

function errorCode(error: unknown): string | undefined {
    if (error instanceof QueryFailedError) {
        const driverError: unknown = error.driverError;
        if (driverError instanceof Error && 'code' in driverError && typeof driverError.code === 'string') {
            return driverError.code;
        }
    }
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

// map anything thrown by the storage layer onto the cellar error kinds
export function translateStorageError(error: unknown): unknown {
    if (error instanceof CellarException) {
        return error;
    }

    const code = errorCode(error);

    if (code === PG_UNIQUE_VIOLATION) {
        return new ConflictError(CellarRule.UNIQUE_VIOLATION, 'A record with the same unique value already exists');
    }

    // bad input that slipped past validation is not worth a retry
    if (code === PG_NUMERIC_OUT_OF_RANGE) {
        return new ValidationError(CellarRule.INVALID_QUANTITY, 'Quantity is out of range for storage');
    }
    if (code === PG_INVALID_TEXT_REPRESENTATION) {
        return new ValidationError(CellarRule.INVALID_PAYLOAD, 'Malformed identifier or value');
    }

    // typeorm errors, driver errors (pg sqlstate codes) and socket errors (ECONNREFUSED...)
    if (error instanceof TypeORMError || code !== undefined) {
        const message = error instanceof Error ? error.message : String(error);
        return new InfrastructureError(`Storage failure: ${message}`, error);
    }

    return error;
}
