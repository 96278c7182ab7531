/**
 * Pool API Routes
 *
 * Reserves, quotes and LP positions. Liquidity changes require attestation.
 */

import { Router, type RequestHandler } from 'express';
import { parseAmount } from '../../../protocol/math/checked.js';
import { LedgerError } from '../../../protocol/errors/LedgerError.js';
import type { OperationDispatcher } from '../../../runtime/dispatcher/OperationDispatcher.js';
import { assetLabel, parseAsset } from '../../../runtime/ledger/Asset.js';
import { amountField, optionalString } from '../request.js';
import { contextOf, handle, type Clock } from './handler.js';

export function createPoolRoutes(dispatcher: OperationDispatcher, attest: RequestHandler, clock: Clock): Router {
    const router = Router();

    /**
     * GET /api/pool
     * Reserves, k, LP supply and fee statistics
     */
    router.get('/', handle(() => {
        const pool = dispatcher.getPool();
        return {
            ...pool,
            assetA: assetLabel(pool.assetA),
            assetB: assetLabel(pool.assetB),
            fees: dispatcher.getFeeConfig(),
            paused: dispatcher.isPaused(),
        };
    }));

    /**
     * GET /api/pool/quote?from=XLM&amount=1000
     * Read-only swap preview
     */
    router.get('/quote', handle((req) => {
        const { from, amount } = req.query;
        if (typeof from !== 'string') {
            throw new LedgerError('InvalidAsset', 'from must be an asset symbol', { field: 'from' });
        }
        const quote = dispatcher.quoteSwap(parseAsset(from), parseAmount(amount));
        return {
            amountIn: quote.amountIn,
            fee: quote.fee,
            amountOut: quote.amountOut,
            priceImpactBps: quote.priceImpactBps,
        };
    }));

    router.get('/lp/:user', handle((req) => ({
        user: req.params.user,
        ...dispatcher.getLpPosition(req.params.user),
    })));

    // ========== WRITES ==========

    router.post('/add', attest, handle((req, res) => {
        const ctx = contextOf(res, clock);
        return dispatcher.addLiquidity(ctx, {
            user: optionalString(req.body, 'user') ?? ctx.caller,
            amountA: amountField(req.body, 'amountA'),
            amountB: amountField(req.body, 'amountB'),
        });
    }));

    router.post('/remove', attest, handle((req, res) => {
        const ctx = contextOf(res, clock);
        return dispatcher.removeLiquidity(ctx, {
            user: optionalString(req.body, 'user') ?? ctx.caller,
            lpAmount: amountField(req.body, 'lpAmount'),
        });
    }));

    return router;
}
