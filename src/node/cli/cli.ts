#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { adminCommand } from './commands/admin.js';
import { identityCommand } from './commands/identity.js';
import { addLedgerCommands } from './commands/ledger.js';
import { poolCommand } from './commands/pool.js';
import { addStatusCommands } from './commands/status.js';
import { config } from '../../config.js';
import { startServer } from '../api/server.js';
import { getPackageVersion } from '../ledger.js';

const program = new Command();

program
    .name('swap-ledger')
    .description('Two-asset ledger with a constant-product pool and invariant checks')
    .version(getPackageVersion());

addLedgerCommands(program);
addStatusCommands(program);

program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <number>', 'API server port', String(config.api.port))
    .action((options: { port: string }) => {
        startServer(Number.parseInt(options.port, 10));
    });

// Add commands BEFORE parse()
program.addCommand(poolCommand);
program.addCommand(adminCommand);
program.addCommand(identityCommand);

await program.parseAsync();
