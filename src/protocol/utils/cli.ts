/**
 * CLI Formatting Utility
 *
 * Boxes, colors and symbols for command output, built on chalk, boxen,
 * figures and log-symbols. figures/log-symbols fall back to ASCII on
 * terminals without Unicode.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';
import { isLedgerError } from '../errors/LedgerError.js';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,
    pointer: figures.pointer,
    bullet: figures.bullet,
    tick: figures.tick,
    cross: figures.cross,

    rocket: '🚀',
    key: '🔐',
    money: '💰',
    lightning: '⚡',
    gem: '💎',
    chart: '📊',
    shield: '🛡️',
    lock: '🔒',
    unlock: '🔓',
    package: '📦',
    scroll: '📜',
    globe: '🌐',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    bold: chalk.bold,
    dim: chalk.dim,
    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

function titledBox(content: string, title: string, borderColor: BoxenOptions['borderColor']): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor,
        title,
        titleAlignment: 'center',
    });
}

export function successBox(content: string, title?: string): string {
    return titledBox(content, title || `${sym.success} Success`, 'green');
}

export function errorBox(content: string, title?: string): string {
    return titledBox(content, title || `${sym.error} Error`, 'red');
}

export function warningBox(content: string, title?: string): string {
    return titledBox(content, title || `${sym.warning} Warning`, 'yellow');
}

export function infoBox(content: string, title?: string): string {
    return titledBox(content, title || `${sym.info} Info`, 'blue');
}

export function header(title: string, emoji: string = sym.gem): string {
    return boxen(c.heading(`${emoji} Swap Ledger · ${title}`), {
        padding: { top: 0, bottom: 0, left: 2, right: 2 },
        borderStyle: 'round',
        borderColor: 'cyan',
    });
}

// ==================== LINES ====================

/** Aligned "label: value" rows for a box body. */
export function rows(entries: Array<[string, string]>): string {
    const width = Math.max(...entries.map(([label]) => label.length)) + 1;
    return entries.map(([label, value]) => `${c.label(`${label}:`.padEnd(width))} ${c.value(value)}`).join('\n');
}

export function success(msg: string): void {
    console.log(`${sym.success} ${c.success(msg)}`);
}

export function warn(msg: string): void {
    console.log(`${sym.warning} ${c.warning(msg)}`);
}

/** Error box for a failed command; ledger errors show their kind. */
export function failure(error: unknown): string {
    if (isLedgerError(error)) {
        const lines = [c.error(error.message), `${c.label('Kind:')} ${c.value(error.kind)}`];
        if (error.details) {
            for (const [key, value] of Object.entries(error.details)) {
                lines.push(`${c.label(`${key}:`)} ${c.value(value)}`);
            }
        }
        return errorBox(lines.join('\n'), `${sym.error} ${error.fatal ? 'Fatal' : 'Rejected'}`);
    }
    return errorBox(c.error(error instanceof Error ? error.message : String(error)));
}

export default {
    sym,
    c,
    successBox,
    errorBox,
    warningBox,
    infoBox,
    header,
    rows,
    success,
    warn,
    failure,
};
