/**
 * Metrics and audit commands
 */

import type { Command } from 'commander';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { action, openDispatcher } from './shared.js';

export function addStatusCommands(program: Command): void {
    program
        .command('metrics')
        .description('Show counters and aggregate totals')
        .action(action(() => {
            const dispatcher = openDispatcher();
            const metrics = dispatcher.getMetrics();
            const totals = dispatcher.getTotals();
            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['Trades', String(metrics.tradeCount)],
                ['Failed orders', String(metrics.failedOrderCount)],
                ['Balance updates', String(metrics.balancesUpdated)],
                ['Users', String(totals.totalUsers)],
                ['Total minted', totals.totalMinted.toString()],
                ['Fee accumulator', totals.feeAccumulator.toString()],
                ['Trading volume', totals.tradingVolume.toString()],
                ['Version', String(metrics.version)],
            ]), `${sym.chart} Metrics`));
            console.log('');
        }));

    program
        .command('audit')
        .description('Re-check the snapshot invariants of the stored state')
        .action(action(() => {
            const dispatcher = openDispatcher();
            const results = dispatcher.audit();
            const lines = results.map((r) => r.holds
                ? `${c.success(sym.tick)} ${r.invariant}`
                : `${c.error(sym.cross)} ${r.invariant}: ${r.detail ?? ''}`);
            const haltReason = dispatcher.getHaltReason();
            if (haltReason) lines.push('', c.warning(`Halted: ${haltReason}`));

            const healthy = results.every((r) => r.holds);
            console.log('');
            console.log(healthy
                ? cli.successBox(lines.join('\n'), `${sym.shield} Invariants Hold`)
                : cli.errorBox(lines.join('\n'), `${sym.shield} Invariant Violation`));
            console.log('');
            if (!healthy) process.exit(1);
        }));
}
