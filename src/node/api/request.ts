/**
 * Request field parsing shared by the routes and the CLI.
 * Amounts travel as decimal strings; assets as symbols ("XLM", "USDCSIM").
 */

import type { Response } from 'express';
import { LedgerError, unauthorized } from '../../protocol/errors/LedgerError.js';
import { parseAmount } from '../../protocol/math/checked.js';
import { parseAsset, type Asset } from '../../runtime/ledger/Asset.js';
import type { BatchMode, BatchOperation } from '../../runtime/dispatcher/operations.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function field(body: unknown, name: string): unknown {
    return isRecord(body) ? body[name] : undefined;
}

export function stringField(body: unknown, name: string): string {
    const value = field(body, name);
    if (typeof value !== 'string' || value.length === 0) {
        throw new LedgerError('InvalidIdentity', `${name} is required`, { field: name });
    }
    return value;
}

export function optionalString(body: unknown, name: string): string | undefined {
    const value = field(body, name);
    return value === undefined ? undefined : stringField(body, name);
}

export function amountField(body: unknown, name: string): bigint {
    return parseAmount(field(body, name), name);
}

export function optionalAmount(body: unknown, name: string): bigint | undefined {
    const value = field(body, name);
    return value === undefined ? undefined : parseAmount(value, name);
}

export function assetField(body: unknown, name: string): Asset {
    const value = field(body, name);
    if (typeof value !== 'string') {
        throw new LedgerError('InvalidAsset', `${name} must be an asset symbol`, { field: name });
    }
    return parseAsset(value);
}

export function integerField(body: unknown, name: string): number {
    const value = field(body, name);
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
        throw new LedgerError('InvalidAmount', `${name} must be an integer`, { field: name });
    }
    return parsed;
}

export function batchModeField(body: unknown): BatchMode {
    const value = field(body, 'mode') ?? 'atomic';
    if (value !== 'atomic' && value !== 'best-effort') {
        throw new LedgerError('InvalidAmount', 'mode must be "atomic" or "best-effort"', { field: 'mode' });
    }
    return value;
}

/** One entry of a batch body, with `user` defaulting to the caller. */
export function parseBatchOperation(entry: unknown, caller: string): BatchOperation {
    const type = field(entry, 'type');
    const user = optionalString(entry, 'user') ?? caller;
    switch (type) {
        case 'mint':
            return { type, request: { asset: assetField(entry, 'asset'), to: stringField(entry, 'to'), amount: amountField(entry, 'amount') } };
        case 'transfer':
            return {
                type,
                request: { fromAsset: assetField(entry, 'fromAsset'), toAsset: assetField(entry, 'toAsset'), user, amount: amountField(entry, 'amount') },
            };
        case 'swap':
            return {
                type,
                request: {
                    from: assetField(entry, 'from'),
                    to: assetField(entry, 'to'),
                    amount: amountField(entry, 'amount'),
                    user,
                    minAmountOut: optionalAmount(entry, 'minAmountOut'),
                },
            };
        case 'addLiquidity':
            return { type, request: { user, amountA: amountField(entry, 'amountA'), amountB: amountField(entry, 'amountB') } };
        case 'removeLiquidity':
            return { type, request: { user, lpAmount: amountField(entry, 'lpAmount') } };
        default:
            throw new LedgerError('InvalidAmount', `Unknown batch operation: ${String(type)}`, { field: 'type' });
    }
}

/** Caller identity placed on res.locals by the attestation middleware. */
export function callerOf(res: Response): string {
    const caller: unknown = res.locals.caller;
    if (typeof caller !== 'string') throw unauthorized();
    return caller;
}
