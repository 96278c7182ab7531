/**
 * Ledger CLI Commands
 * Balances, minting, conversions, swaps and history
 */

import type { Command } from 'commander';
import { parseAmount } from '../../../protocol/math/checked.js';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { assetLabel, parseAsset } from '../../../runtime/ledger/Asset.js';
import { action, callerContext, openDispatcher, shortKey } from './shared.js';

export function addLedgerCommands(program: Command): void {
    program
        .command('init')
        .description('Create the genesis ledger state (or show the existing one)')
        .action(action(() => {
            const dispatcher = openDispatcher();
            const pool = dispatcher.getPool();
            const fees = dispatcher.getFeeConfig();
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Admin', shortKey(dispatcher.getAdmin())],
                ['Pool', `${assetLabel(pool.assetA)} / ${assetLabel(pool.assetB)}`],
                ['Swap fee', `${fees.swapFeeBps} bps (${fees.routing})`],
                ['Transfer fee', `${fees.transferFeeBps} bps`],
                ['Version', String(dispatcher.getMetrics().version)],
            ]), `${sym.rocket} Ledger Ready`));
            console.log('');
        }));

    program
        .command('balance <user>')
        .description('Show balances of a user')
        .option('-a, --asset <symbol>', 'Only this asset')
        .action(action((user: string, options: { asset?: string }) => {
            const dispatcher = openDispatcher();
            const entries: Array<[string, string]> = options.asset
                ? [[assetLabel(parseAsset(options.asset)), dispatcher.balanceOf(user, parseAsset(options.asset)).toString()]]
                : dispatcher.balancesOf(user).map((b) => [assetLabel(b.asset), b.amount.toString()]);

            console.log('');
            console.log(cli.infoBox(
                entries.length > 0 ? cli.rows(entries) : c.dim('No balances'),
                `${sym.money} ${shortKey(user)}`,
            ));
            console.log('');
        }));

    program
        .command('mint')
        .description('Mint units to a user (admin)')
        .requiredOption('--caller <identity>', 'Attested caller')
        .requiredOption('--to <identity>', 'Recipient')
        .requiredOption('--asset <symbol>', 'Asset symbol')
        .requiredOption('--amount <integer>', 'Amount in base units')
        .action(action((options: { caller: string; to: string; asset: string; amount: string }) => {
            const dispatcher = openDispatcher();
            const asset = parseAsset(options.asset);
            const balance = dispatcher.mint(callerContext(options.caller), {
                asset,
                to: options.to,
                amount: parseAmount(options.amount),
            });
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Minted', `${options.amount} ${assetLabel(asset)}`],
                ['To', shortKey(options.to)],
                ['Balance', balance.toString()],
            ]), `${sym.tick} Minted`));
            console.log('');
        }));

    program
        .command('transfer')
        .description('Convert units between two assets of the same account')
        .requiredOption('--caller <identity>', 'Attested caller (account owner)')
        .requiredOption('--from <symbol>', 'Asset debited')
        .requiredOption('--to <symbol>', 'Asset credited')
        .requiredOption('--amount <integer>', 'Amount in base units')
        .action(action((options: { caller: string; from: string; to: string; amount: string }) => {
            const dispatcher = openDispatcher();
            const result = dispatcher.transfer(callerContext(options.caller), {
                fromAsset: parseAsset(options.from),
                toAsset: parseAsset(options.to),
                user: options.caller,
                amount: parseAmount(options.amount),
            });
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Debited', `${result.debited} ${options.from.toUpperCase()}`],
                ['Credited', `${result.credited} ${options.to.toUpperCase()}`],
                ['Fee', result.fee.toString()],
            ]), `${sym.tick} Transferred`));
            console.log('');
        }));

    program
        .command('swap')
        .description('Swap through the pool')
        .requiredOption('--caller <identity>', 'Attested caller (trader)')
        .requiredOption('--from <symbol>', 'Asset sold')
        .requiredOption('--to <symbol>', 'Asset bought')
        .requiredOption('--amount <integer>', 'Amount sold in base units')
        .option('--min-out <integer>', 'Minimum acceptable output')
        .action(action((options: { caller: string; from: string; to: string; amount: string; minOut?: string }) => {
            const dispatcher = openDispatcher();
            const result = dispatcher.swap(callerContext(options.caller), {
                from: parseAsset(options.from),
                to: parseAsset(options.to),
                amount: parseAmount(options.amount),
                minAmountOut: options.minOut === undefined ? undefined : parseAmount(options.minOut, 'min-out'),
            });
            const impact = `${(result.priceImpactBps / 100).toFixed(2)}%`;
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Sold', `${result.amountIn} ${options.from.toUpperCase()}`],
                ['Bought', `${result.amountOut} ${options.to.toUpperCase()}`],
                ['Fee', result.fee.toString()],
                ['Price impact', result.priceImpactBps > 100 ? c.warning(impact) : impact],
            ]), `${sym.lightning} Swapped`));
            console.log('');
        }));

    program
        .command('quote')
        .description('Preview a swap without executing it')
        .requiredOption('--from <symbol>', 'Asset sold')
        .requiredOption('--amount <integer>', 'Amount sold in base units')
        .action(action((options: { from: string; amount: string }) => {
            const dispatcher = openDispatcher();
            const quote = dispatcher.quoteSwap(parseAsset(options.from), parseAmount(options.amount));
            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['In', `${quote.amountIn} ${options.from.toUpperCase()}`],
                ['Out', quote.amountOut.toString()],
                ['Fee', quote.fee.toString()],
                ['Price impact', `${(quote.priceImpactBps / 100).toFixed(2)}%`],
            ]), `${sym.lightning} Swap Quote`));
            console.log('');
        }));

    program
        .command('history <user>')
        .description('Recent swaps of a user, newest first')
        .option('-l, --limit <n>', 'Number of trades', '10')
        .action(action((user: string, options: { limit: string }) => {
            const dispatcher = openDispatcher();
            const trades = dispatcher.getUserTransactions(user, Number.parseInt(options.limit, 10));
            console.log('');
            if (trades.length === 0) {
                cli.warn('No trades yet');
                console.log('');
                return;
            }
            const lines = trades.map((t) =>
                `${c.dim(new Date(t.timestamp).toISOString())} ${t.fromAmount} ${assetLabel(t.fromAsset)} ${sym.arrow} ${t.toAmount} ${assetLabel(t.toAsset)}`);
            console.log(cli.infoBox(lines.join('\n'), `${sym.scroll} History · ${shortKey(user)}`));
            console.log('');
        }));
}
