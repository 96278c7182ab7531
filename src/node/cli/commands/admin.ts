/**
 * Admin CLI Commands
 */

import { Command } from 'commander';
import cli, { sym } from '../../../protocol/utils/cli.js';
import { action, callerContext, openDispatcher, shortKey } from './shared.js';

interface CallerOptions {
    caller: string;
}

export const adminCommand = new Command('admin')
    .description('Admin operations (caller must be the current admin)');

adminCommand
    .command('set-admin <newAdmin>')
    .requiredOption('--caller <identity>', 'Attested caller')
    .action(action((newAdmin: string, options: CallerOptions) => {
        openDispatcher().setAdmin(callerContext(options.caller), newAdmin);
        console.log('');
        console.log(cli.successBox(cli.rows([['New admin', shortKey(newAdmin)]]), `${sym.key} Admin Changed`));
        console.log('');
    }));

adminCommand
    .command('pause')
    .description('Stop transfers, swaps and liquidity changes')
    .requiredOption('--caller <identity>', 'Attested caller')
    .action(action((options: CallerOptions) => {
        openDispatcher().pauseTrading(callerContext(options.caller));
        console.log('');
        console.log(cli.warningBox('Trading is paused', `${sym.lock} Paused`));
        console.log('');
    }));

adminCommand
    .command('resume')
    .description('Resume trading, clearing any halt')
    .requiredOption('--caller <identity>', 'Attested caller')
    .action(action((options: CallerOptions) => {
        openDispatcher().resumeTrading(callerContext(options.caller));
        console.log('');
        console.log(cli.successBox('Trading is open', `${sym.unlock} Resumed`));
        console.log('');
    }));

adminCommand
    .command('migrate <version>')
    .description('Advance the state schema version')
    .requiredOption('--caller <identity>', 'Attested caller')
    .action(action((version: string, options: CallerOptions) => {
        const dispatcher = openDispatcher();
        const current = dispatcher.migrate(callerContext(options.caller), Number(version));
        const migratedAt = dispatcher.getMigratedAt();
        console.log('');
        console.log(cli.successBox(cli.rows([
            ['Version', String(current)],
            ['Migrated at', migratedAt === null ? '-' : new Date(migratedAt).toISOString()],
        ]), `${sym.package} Migrated`));
        console.log('');
    }));
