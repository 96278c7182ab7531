import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { logger } from '../../protocol/utils/logger.js';
import type { OperationDispatcher } from '../../runtime/dispatcher/OperationDispatcher.js';
import { attestCaller } from './middleware/attestation.js';
import { errorHandler, notFound } from './middleware/errors.js';
import { createAdminRoutes } from './routes/admin.js';
import type { Clock } from './routes/handler.js';
import { createLedgerRoutes } from './routes/ledger.js';
import { createMetricsRoutes } from './routes/metrics.js';
import { createPoolRoutes } from './routes/pool.js';

const log = logger.child('API');

const DEFAULT_NONCE_WINDOW_MS = 5 * 60 * 1000;

export interface ApiOptions {
    requireSignatures: boolean;
    /** Accepted drift of X-Nonce from the host clock. */
    nonceWindowMs?: number;
    rateLimit: { windowMs: number; maxRequests: number };
    corsOrigin?: string;
    clock?: Clock;
    version?: string;
}

export function createApp(dispatcher: OperationDispatcher, options: ApiOptions): Express {
    const app: Express = express();
    const clock = options.clock ?? Date.now;
    const attest = attestCaller({
        requireSignatures: options.requireSignatures,
        nonceWindowMs: options.nonceWindowMs ?? DEFAULT_NONCE_WINDOW_MS,
    });

    const apiLimiter = rateLimit({
        windowMs: options.rateLimit.windowMs,
        limit: options.rateLimit.maxRequests,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
            success: false,
            error: 'Too many requests, please try again later.',
        },
    });

    // Amounts are bigints; they leave the API as decimal strings
    app.set('json replacer', (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));

    // Trust proxy for nginx reverse proxy (needed for rate limiting behind nginx)
    app.set('trust proxy', 1);
    app.use(cors({ origin: options.corsOrigin ?? '*' }));
    app.use(express.json({ limit: '100kb' }));
    app.use('/api', apiLimiter);

    app.use((req: Request, _res: Response, next: NextFunction) => {
        log.debug(`${req.method} ${req.path}`);
        next();
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                status: dispatcher.isPaused() ? 'paused' : 'healthy',
                version: options.version ?? '0.0.0',
                uptime: process.uptime(),
                timestamp: Date.now(),
            },
        });
    });

    app.use('/api/ledger', createLedgerRoutes(dispatcher, attest, clock));
    app.use('/api/pool', createPoolRoutes(dispatcher, attest, clock));
    app.use('/api/admin', createAdminRoutes(dispatcher, attest, clock));
    app.use('/api', createMetricsRoutes(dispatcher));

    app.use(notFound);
    app.use(errorHandler);

    return app;
}
