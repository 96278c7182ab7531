/**
 * Checked integer arithmetic on bigint amounts.
 *
 * Every operation either returns an exact in-range result or throws a
 * LedgerError. Nothing wraps and nothing saturates silently.
 */

import { LedgerError } from '../errors/LedgerError.js';
import { MAX_AMOUNT, U32_MAX } from '../params/ledger.js';

function assertInRange(value: bigint, op: string): bigint {
    if (value > MAX_AMOUNT) {
        throw new LedgerError('AmountOverflow', `Overflow in ${op}`, { op });
    }
    if (value < -MAX_AMOUNT - 1n) {
        throw new LedgerError('AmountOverflow', `Underflow in ${op}`, { op });
    }
    return value;
}

export const CheckedMath = {
    add(a: bigint, b: bigint): bigint {
        return assertInRange(a + b, 'add');
    },
    /** Throws InsufficientBalance when the result would be negative. */
    sub(a: bigint, b: bigint): bigint {
        if (b > a) {
            throw new LedgerError('InsufficientBalance', 'Underflow', { available: a.toString(), requested: b.toString() });
        }
        return a - b;
    },
    mul(a: bigint, b: bigint): bigint {
        return assertInRange(a * b, 'mul');
    },
    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new LedgerError('InvalidAmount', 'Division by zero');
        return a / b;
    },
};

/**
 * Saturating u32 increment. Returns the new value and whether it is stuck at the max.
 */
export function saturatingIncrement(value: number): { value: number; saturated: boolean } {
    if (value >= U32_MAX) {
        return { value: U32_MAX, saturated: true };
    }
    return { value: value + 1, saturated: false };
}

/** Integer square root (Babylonian method), floor(sqrt(value)). */
export function isqrt(value: bigint): bigint {
    if (value < 0n) throw new LedgerError('InvalidAmount', 'Square root of negative number');
    if (value < 2n) return value;

    let x = value;
    let y = (x + 1n) / 2n;
    while (y < x) {
        x = y;
        y = (x + value / x) / 2n;
    }
    return x;
}

export function minBigInt(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

/**
 * Parse a non-negative decimal integer string (API/CLI input) into a bigint.
 */
export function parseAmount(value: unknown, field: string = 'amount'): bigint {
    let text: string;
    if (typeof value === 'string') {
        text = value.trim();
    } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
        text = value.toString();
    } else if (typeof value === 'bigint') {
        text = value.toString();
    } else {
        throw new LedgerError('InvalidAmount', `${field} must be an integer string`, { field });
    }

    if (!/^\d+$/.test(text)) {
        throw new LedgerError('InvalidAmount', `${field} must be a non-negative integer`, { field });
    }
    return assertInRange(BigInt(text), field);
}
