/**
 * Pool CLI Commands
 * Liquidity pool operations
 */

import { Command } from 'commander';
import { parseAmount } from '../../../protocol/math/checked.js';
import cli, { sym } from '../../../protocol/utils/cli.js';
import { assetLabel } from '../../../runtime/ledger/Asset.js';
import { action, callerContext, openDispatcher, shortKey } from './shared.js';

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

// INFO command
poolCommand
    .command('info')
    .description('Show reserves, LP supply and fees')
    .action(action(() => {
        const dispatcher = openDispatcher();
        const pool = dispatcher.getPool();
        const fees = dispatcher.getFeeConfig();
        const a = assetLabel(pool.assetA);
        const b = assetLabel(pool.assetB);

        console.log('');
        console.log(cli.infoBox(cli.rows([
            [`Reserve ${a}`, pool.reserveA.toString()],
            [`Reserve ${b}`, pool.reserveB.toString()],
            ['k', pool.k.toString()],
            ['LP supply', pool.lpTotalSupply.toString()],
            ['LP locked', pool.lpBurned.toString()],
            ['LP fees', pool.lpFeesAccumulated.toString()],
            ['Fee', `${fees.swapFeeBps} bps → ${fees.routing}`],
            ['Trading', dispatcher.isPaused() ? 'paused' : 'open'],
        ]), `${sym.gem} ${a} / ${b} Pool`));
        console.log('');
    }));

// ADD command
poolCommand
    .command('add')
    .description('Deposit both pool assets for LP tokens')
    .requiredOption('--caller <identity>', 'Attested caller (provider)')
    .requiredOption('--amount-a <integer>', 'Amount of asset A')
    .requiredOption('--amount-b <integer>', 'Amount of asset B')
    .action(action((options: { caller: string; amountA: string; amountB: string }) => {
        const dispatcher = openDispatcher();
        const result = dispatcher.addLiquidity(callerContext(options.caller), {
            user: options.caller,
            amountA: parseAmount(options.amountA, 'amount-a'),
            amountB: parseAmount(options.amountB, 'amount-b'),
        });
        const entries: Array<[string, string]> = [
            ['Provider', shortKey(options.caller)],
            ['LP minted', result.lpMinted.toString()],
        ];
        if (result.lpLocked > 0n) entries.push(['LP locked', result.lpLocked.toString()]);

        console.log('');
        console.log(cli.successBox(cli.rows(entries), `${sym.tick} Liquidity Added`));
        console.log('');
    }));

// REMOVE command
poolCommand
    .command('remove')
    .description('Burn LP tokens for a share of both reserves')
    .requiredOption('--caller <identity>', 'Attested caller (provider)')
    .requiredOption('--lp <integer>', 'LP tokens to burn')
    .action(action((options: { caller: string; lp: string }) => {
        const dispatcher = openDispatcher();
        const pool = dispatcher.getPool();
        const result = dispatcher.removeLiquidity(callerContext(options.caller), {
            user: options.caller,
            lpAmount: parseAmount(options.lp, 'lp'),
        });

        console.log('');
        console.log(cli.successBox(cli.rows([
            ['LP burned', result.lpBurned.toString()],
            [assetLabel(pool.assetA), result.amountA.toString()],
            [assetLabel(pool.assetB), result.amountB.toString()],
        ]), `${sym.tick} Liquidity Removed`));
        console.log('');
    }));

// POSITION command
poolCommand
    .command('position <user>')
    .description('Show an LP position')
    .action(action((user: string) => {
        const dispatcher = openDispatcher();
        const position = dispatcher.getLpPosition(user);
        console.log('');
        console.log(cli.infoBox(cli.rows([
            ['LP tokens', position.lpTokens.toString()],
            ['Deposited A', position.depositedA.toString()],
            ['Deposited B', position.depositedB.toString()],
        ]), `${sym.gem} ${shortKey(user)}`));
        console.log('');
    }));
