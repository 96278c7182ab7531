import { config } from '../../../config.js';
import { Logger } from '../../../protocol/utils/logger.js';
import cli from '../../../protocol/utils/cli.js';
import type { CallContext } from '../../../runtime/dispatcher/operations.js';
import type { OperationDispatcher } from '../../../runtime/dispatcher/OperationDispatcher.js';
import { openLedger } from '../../ledger.js';

/**
 * Commands print boxes; the logger only speaks up for warnings unless
 * LOG_LEVEL asks for more.
 */
export function openDispatcher(): OperationDispatcher {
    if (!process.env.LOG_LEVEL) Logger.setThreshold('warn');
    return openLedger(config).dispatcher;
}

/** The local operator is the attesting host for --caller. */
export function callerContext(caller: string): CallContext {
    return { caller, timestamp: Date.now() };
}

export function shortKey(identity: string): string {
    return identity.length > 24 ? `${identity.slice(0, 12)}...${identity.slice(-8)}` : identity;
}

/** Run a command body, printing an error box and exiting 1 on failure. */
export function action<A extends unknown[]>(fn: (...args: A) => void | Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await fn(...args);
        } catch (error) {
            console.log('');
            console.log(cli.failure(error));
            console.log('');
            process.exit(1);
        }
    };
}
