import Decimal from 'decimal.js';
import { ValidationError } from '../errors/cellar.exception';
import { CellarRule } from '../enums/cellar-rule.enum';

export type QuantityInput = string | number;

// quantity columns are decimal(14,4)
export const QUANTITY_INTEGER_DIGITS = 10;
export const QUANTITY_SCALE = 4;
export const QUANTITY_PATTERN = /^\d{1,10}(\.\d{1,4})?$/;
export const QUANTITY_FORMAT_MESSAGE = `must be a non-negative decimal number with at most ${QUANTITY_INTEGER_DIGITS} integer digits and ${QUANTITY_SCALE} decimal places`;

// parse a caller supplied amount, exactly as written
export function parseQuantity(value: QuantityInput, field: string = 'quantity'): Decimal {
    const text = typeof value === 'number' ? numberText(value) : value.trim();

    if (!QUANTITY_PATTERN.test(text)) {
        throw new ValidationError(
            CellarRule.INVALID_QUANTITY,
            `${field} ${QUANTITY_FORMAT_MESSAGE}, got "${String(value)}"`,
            { field, value: String(value) },
        );
    }

    return new Decimal(text);
}

// plain notation, String(1e-7) would give "1e-7"
function numberText(value: number): string {
    return Number.isFinite(value) ? new Decimal(value).toFixed() : String(value);
}

export function toDecimal(stored: string): Decimal {
    return new Decimal(stored);
}

// canonical text form: no trailing zeros, no exponent
export function formatQuantity(value: Decimal | string): string {
    const decimal = typeof value === 'string' ? new Decimal(value) : value;
    return decimal.toFixed();
}

export function percentOf(part: string, whole: string): string {
    const total = new Decimal(whole);
    if (total.isZero()) {
        return '0.00';
    }
    return new Decimal(part)
        .dividedBy(total)
        .times(100)
        .toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
        .toFixed(2);
}
