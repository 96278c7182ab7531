import type { Request, Response, NextFunction } from 'express';
import { isLedgerError, type LedgerErrorKind } from '../../../protocol/errors/LedgerError.js';
import { logger } from '../../../protocol/utils/logger.js';

const log = logger.child('API');

export const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
    InvalidAmount: 400,
    InvalidAsset: 400,
    InvalidIdentity: 400,
    SameAssetSwap: 400,
    InvalidSwapPair: 400,
    BatchTooLarge: 400,
    Unauthorized: 403,
    InsufficientBalance: 409,
    InsufficientLiquidity: 409,
    SlippageExceeded: 409,
    AmountOverflow: 422,
    InvalidMigration: 422,
    TradingPaused: 423,
    FeeConfigurationInvalid: 500,
    InvariantViolation: 500,
    ClockRegression: 500,
    CorruptState: 500,
};

function isBodyParseError(err: unknown): boolean {
    return err instanceof SyntaxError && 'body' in err;
}

export function notFound(_req: Request, res: Response): void {
    res.status(404).json({ success: false, error: 'Endpoint not found' });
}

// Express recognizes error handlers by arity, so `_next` stays.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (isLedgerError(err)) {
        const status = STATUS_BY_KIND[err.kind];
        if (status >= 500) {
            log.error(`${req.method} ${req.path} failed [${err.kind}]: ${err.message}`);
        } else {
            log.debug(`${req.method} ${req.path} rejected [${err.kind}]`);
        }
        res.status(status).json({ success: false, error: err.message, kind: err.kind, details: err.details });
        return;
    }

    if (isBodyParseError(err)) {
        res.status(400).json({ success: false, error: 'Malformed JSON body', kind: 'Unknown' });
        return;
    }

    log.error('Server error:', err);
    res.status(500).json({ success: false, error: 'Internal server error', kind: 'Unknown' });
}
