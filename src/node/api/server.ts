import type { Server } from 'http';
import { config } from '../../config.js';
import { logger, Logger } from '../../protocol/utils/logger.js';
import { getPackageVersion, openLedger } from '../ledger.js';
import { createApp } from './app.js';

/** Load the ledger and serve the HTTP API until the process is stopped. */
export function startServer(port: number = config.api.port): Server {
    Logger.setThreshold(config.logLevel);
    const { dispatcher, store } = openLedger(config);

    const app = createApp(dispatcher, {
        requireSignatures: config.api.requireSignatures,
        nonceWindowMs: config.api.nonceWindowMs,
        rateLimit: config.api.rateLimit,
        corsOrigin: config.api.cors.origin,
        version: getPackageVersion(),
    });

    if (!config.api.requireSignatures) {
        logger.warn('⚠️ API_REQUIRE_SIGNATURES=false: X-Caller is trusted without a signature');
    }

    return app.listen(port, () => {
        logger.info(`🌐 API listening on http://localhost:${port}`);
        logger.info(`💾 State file: ${store.location}`);
        logger.info(`👤 Admin: ${dispatcher.getAdmin()}`);
    });
}
