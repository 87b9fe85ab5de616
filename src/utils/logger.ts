/**
 * Logger utility
 * Chalk-based colored console output
 *
 * `log` is user-facing CLI output. `logger` is the diagnostic channel used by the
 * auth and client layers; it always writes to stderr because stdout carries the
 * MCP protocol when running as a server.
 */

import chalk from 'chalk';

export const log = {
    info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
    success: (msg: string) => console.log(chalk.green('✔'), msg),
    warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
    error: (msg: string) => console.error(chalk.red('✖'), msg),
    dim: (msg: string) => console.log(chalk.dim(msg)),
    bold: (msg: string) => console.log(chalk.bold(msg)),

    // Section header
    header: (title: string) => {
        console.log();
        console.log(chalk.bold.underline(title));
        console.log();
    },

    // Key-value pair
    kv: (key: string, value: string | number | boolean) => {
        console.log(`  ${chalk.dim(key + ':')} ${value}`);
    },
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
    debug: chalk.dim('DEBUG'),
    info: chalk.cyan('INFO '),
    warn: chalk.yellow('WARN '),
    error: chalk.red.bold('ERROR'),
};

function initialLevel(): LogLevel {
    const fromEnv = process.env.BRAINLIFT_LOG_LEVEL?.toLowerCase();
    return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

let threshold: LogLevel = initialLevel();

function emit(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const ts = chalk.dim(`[${new Date().toISOString()}]`);
    process.stderr.write(`${ts} ${LEVEL_LABEL[level]} ${level === 'debug' ? chalk.dim(message) : message}\n`);
}

export const logger = {
    debug: (msg: string) => emit('debug', msg),
    info: (msg: string) => emit('info', msg),
    warn: (msg: string) => emit('warn', msg),
    error: (msg: string) => emit('error', msg),

    setLevel: (level: LogLevel) => {
        threshold = level;
    },
};
