import fs from 'fs';
import path from 'path';
import { LedgerError } from '../errors/LedgerError.js';
import { logger } from '../utils/logger.js';
import type { LedgerState } from '../../runtime/ledger/LedgerState.js';
import { deserializeState, serializeState, type PersistedLedgerState } from './codec.js';

/** Load/store interface for the state blob. The host owns durability. */
export interface StateStore {
    load(): LedgerState | null;
    save(state: LedgerState): void;
}

export class FileStateStore implements StateStore {
    private readonly filePath: string;

    constructor(dataDir: string, fileName: string = 'ledger.json') {
        this.filePath = path.join(dataDir, fileName);
        if (!fs.existsSync(dataDir)) {
            fs.mkdirSync(dataDir, { recursive: true });
        }
    }

    get location(): string {
        return this.filePath;
    }

    load(): LedgerState | null {
        if (!fs.existsSync(this.filePath)) {
            return null;
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
        } catch (error) {
            logger.error('Failed to read ledger state:', error);
            throw new LedgerError('CorruptState', `Unreadable state file ${this.filePath}`);
        }
        const state = deserializeState(parsed);
        logger.debug(`📂 Ledger state loaded from ${this.filePath}`);
        return state;
    }

    save(state: LedgerState): void {
        // write-then-rename
        const tmp = `${this.filePath}.tmp`;
        fs.writeFileSync(tmp, JSON.stringify(serializeState(state), null, 2));
        fs.renameSync(tmp, this.filePath);
        logger.debug('💾 Ledger state saved to disk');
    }
}

/** Holds the serialized blob; every load decodes a fresh copy. */
export class MemoryStateStore implements StateStore {
    private blob: PersistedLedgerState | null = null;
    saves = 0;

    load(): LedgerState | null {
        return this.blob ? deserializeState(this.blob) : null;
    }

    save(state: LedgerState): void {
        this.blob = serializeState(state);
        this.saves++;
    }

    peek(): PersistedLedgerState | null {
        return this.blob;
    }
}
