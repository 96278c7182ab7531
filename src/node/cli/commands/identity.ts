/**
 * Identity CLI Command
 * Generate ed25519 identities and sign API requests
 */

import { Command } from 'commander';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { createIdentity, loadIdentity, requestMessage, saveIdentity, signMessage } from '../../identity/index.js';
import { action } from './shared.js';

export const identityCommand = new Command('identity')
    .description('Manage caller identities');

identityCommand
    .command('new')
    .description('Generate a new identity from a fresh 24-word mnemonic')
    .option('-o, --out <file>', 'Write the identity JSON to this file')
    .action(action(async (options: { out?: string }) => {
        const identity = await createIdentity();
        if (options.out) saveIdentity(options.out, identity);

        console.log('');
        console.log(cli.successBox(cli.rows([
            ['Public key', identity.publicKey],
            ['Saved to', options.out ?? c.dim('not saved')],
        ]), `${sym.key} New Identity`));
        console.log('');
        console.log(cli.warningBox(identity.mnemonic ?? '', `${sym.warning} Write down your mnemonic`));
        console.log('');
    }));

identityCommand
    .command('sign')
    .description('Sign an API request; prints X-Caller, X-Nonce and X-Signature headers')
    .requiredOption('-i, --identity <file>', 'Identity JSON file')
    .requiredOption('-m, --method <method>', 'HTTP method', 'POST')
    .requiredOption('-p, --path <path>', 'Request path, e.g. /api/ledger/swap')
    .option('-b, --body <json>', 'JSON body exactly as it will be sent', '{}')
    .option('-n, --nonce <ms>', 'Nonce (defaults to the current time in ms)')
    .action(action(async (options: { identity: string; method: string; path: string; body: string; nonce?: string }) => {
        const keys = loadIdentity(options.identity);
        const body: unknown = JSON.parse(options.body);
        const nonce = options.nonce === undefined ? Date.now() : Number(options.nonce);
        if (!Number.isSafeInteger(nonce) || nonce < 0) {
            throw new Error(`Invalid nonce: ${options.nonce}`);
        }
        const signature = await signMessage(requestMessage(options.method, options.path, nonce, body), keys.privateKey);

        console.log(`X-Caller: ${keys.publicKey}`);
        console.log(`X-Nonce: ${nonce}`);
        console.log(`X-Signature: ${signature}`);
    }));
