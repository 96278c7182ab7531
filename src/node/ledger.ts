import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { Config } from '../config.js';
import { FileStateStore } from '../protocol/storage/StateStore.js';
import { OperationDispatcher } from '../runtime/dispatcher/OperationDispatcher.js';

/** Dispatcher over the configured state file. */
export function openLedger(cfg: Config): { dispatcher: OperationDispatcher; store: FileStateStore } {
    const store = new FileStateStore(cfg.storage.dataDir, cfg.storage.stateFile);
    const dispatcher = new OperationDispatcher({
        admin: cfg.ledger.admin,
        poolAssetB: cfg.ledger.poolAssetB,
        swapFeeBps: cfg.ledger.swapFeeBps,
        transferFeeBps: cfg.ledger.transferFeeBps,
        feeRouting: cfg.ledger.feeRouting,
        store,
    });
    return { dispatcher, store };
}

// Read version from package.json (running from src/ or dist/src/)
export function getPackageVersion(): string {
    const here = dirname(fileURLToPath(import.meta.url));
    for (const candidate of [join(here, '../../package.json'), join(here, '../../../package.json')]) {
        if (!existsSync(candidate)) continue;
        const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
    }
    return '0.0.0';
}
