/**
 * Ledger API Routes
 *
 * Balances, totals and trade history, plus the balance-moving operations.
 */

import { Router, type RequestHandler } from 'express';
import { LedgerError } from '../../../protocol/errors/LedgerError.js';
import type { OperationDispatcher } from '../../../runtime/dispatcher/OperationDispatcher.js';
import { MAX_BATCH_SIZE } from '../../../protocol/params/ledger.js';
import { assetLabel, parseAsset } from '../../../runtime/ledger/Asset.js';
import { amountField, assetField, batchModeField, callerOf, field, optionalAmount, optionalString, parseBatchOperation, stringField } from '../request.js';
import { contextOf, handle, type Clock } from './handler.js';

export function createLedgerRoutes(dispatcher: OperationDispatcher, attest: RequestHandler, clock: Clock): Router {
    const router = Router();

    /**
     * GET /api/ledger/balance/:user?asset=XLM
     * Without ?asset every non-zero balance is listed.
     */
    router.get('/balance/:user', handle((req) => {
        const { user } = req.params;
        const asset = req.query.asset;
        if (typeof asset === 'string') {
            const parsed = parseAsset(asset);
            return { user, asset: assetLabel(parsed), balance: dispatcher.balanceOf(user, parsed) };
        }
        return {
            user,
            balances: dispatcher.balancesOf(user).map((b) => ({ asset: assetLabel(b.asset), balance: b.amount })),
        };
    }));

    router.get('/totals', handle(() => dispatcher.getTotals()));

    /**
     * GET /api/ledger/history/:user?limit=10
     * Newest first.
     */
    router.get('/history/:user', handle((req) => {
        const limit = req.query.limit === undefined ? 10 : Number(req.query.limit);
        return dispatcher.getUserTransactions(req.params.user, limit).map((t) => ({
            timestamp: t.timestamp,
            fromAsset: assetLabel(t.fromAsset),
            toAsset: assetLabel(t.toAsset),
            fromAmount: t.fromAmount,
            toAmount: t.toAmount,
            rate: t.rate,
        }));
    }));

    // ========== WRITES ==========

    router.post('/mint', attest, handle((req, res) => {
        const balance = dispatcher.mint(contextOf(res, clock), {
            asset: assetField(req.body, 'asset'),
            to: stringField(req.body, 'to'),
            amount: amountField(req.body, 'amount'),
        });
        return { balance };
    }));

    router.post('/transfer', attest, handle((req, res) => {
        const ctx = contextOf(res, clock);
        return dispatcher.transfer(ctx, {
            fromAsset: assetField(req.body, 'fromAsset'),
            toAsset: assetField(req.body, 'toAsset'),
            user: optionalString(req.body, 'user') ?? ctx.caller,
            amount: amountField(req.body, 'amount'),
        });
    }));

    router.post('/swap', attest, handle((req, res) => {
        return dispatcher.swap(contextOf(res, clock), {
            from: assetField(req.body, 'from'),
            to: assetField(req.body, 'to'),
            amount: amountField(req.body, 'amount'),
            user: optionalString(req.body, 'user'),
            minAmountOut: optionalAmount(req.body, 'minAmountOut'),
        });
    }));

    /**
     * POST /api/ledger/batch
     * Body: { mode: "atomic" | "best-effort", operations: [{ type, ...fields }] }
     */
    router.post('/batch', attest, handle((req, res) => {
        const operations = field(req.body, 'operations');
        if (!Array.isArray(operations)) {
            throw new LedgerError('InvalidAmount', 'operations must be an array', { field: 'operations' });
        }
        if (operations.length > MAX_BATCH_SIZE) {
            throw new LedgerError('BatchTooLarge', `Batch exceeds ${MAX_BATCH_SIZE} operations`, { size: String(operations.length) });
        }
        const caller = callerOf(res);
        const parsed = operations.map((entry) => parseBatchOperation(entry, caller));
        return dispatcher.executeBatch(contextOf(res, clock), parsed, batchModeField(req.body));
    }));

    return router;
}
