import { RpcException } from '@nestjs/microservices';
import { CellarErrorKind } from '../enums/cellar-error-kind.enum';
import { CellarRule } from '../enums/cellar-rule.enum';

export type ErrorContext = Record<string, string | number | boolean | null>;

// shape sent back to the caller over the transport
export interface CellarErrorPayload {
    kind: CellarErrorKind;
    rule: CellarRule;
    message: string;
    context: ErrorContext;
}

/**
 * Base class of every rejected cellar operation. Callers branch on `kind`
 * and `rule`, the message is for humans.
 */
export class CellarException extends RpcException {
    constructor(
        readonly kind: CellarErrorKind,
        readonly rule: CellarRule,
        message: string,
        readonly context: ErrorContext = {},
    ) {
        super({ kind, rule, message, context });
        this.name = new.target.name;
    }

    getError(): CellarErrorPayload {
        return {
            kind: this.kind,
            rule: this.rule,
            message: this.message,
            context: this.context,
        };
    }
}

export class NotFoundError extends CellarException {
    constructor(entity: string, key: string | number, field: string = 'id') {
        super(
            CellarErrorKind.NOT_FOUND,
            CellarRule.ENTITY_NOT_FOUND,
            `${entity} not found with ${field}: ${key}`,
            { entity, [field]: key },
        );
    }
}

export class ConflictError extends CellarException {
    constructor(rule: CellarRule, message: string, context: ErrorContext = {}) {
        super(CellarErrorKind.CONFLICT, rule, message, context);
    }
}

export class ValidationError extends CellarException {
    constructor(rule: CellarRule, message: string, context: ErrorContext = {}) {
        super(CellarErrorKind.VALIDATION, rule, message, context);
    }
}

// storage is unavailable or failed, the caller may retry
export class InfrastructureError extends CellarException {
    constructor(message: string, cause?: unknown) {
        super(CellarErrorKind.INFRASTRUCTURE, CellarRule.STORAGE_FAILURE, message);
        this.cause = cause;
    }
}
