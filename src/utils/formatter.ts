/**
 * Formatter utility
 * Table and date output for CLI
 */

import chalk from 'chalk';

/**
 * Print data as an aligned table
 */
export function printTable(headers: string[], rows: string[][]): void {
    const colWidths = headers.map((h, i) => {
        const maxData = rows.reduce((max, row) => Math.max(max, (row[i] || '').length), 0);
        return Math.max(h.length, maxData) + 2;
    });

    console.log(headers.map((h, i) => chalk.bold(h.padEnd(colWidths[i]))).join(''));
    console.log(chalk.dim('─'.repeat(colWidths.reduce((a, b) => a + b, 0))));

    for (const row of rows) {
        console.log(row.map((cell, i) => (cell || '').padEnd(colWidths[i])).join(''));
    }
}

/**
 * Format a date as a short readable string; empty or unparseable input gives "-"
 */
export function formatDate(date: Date | string | number | undefined): string {
    if (date === undefined || date === '') return '-';
    const d = new Date(date);
    if (Number.isNaN(d.getTime())) return '-';
    return d.toLocaleString('en-US', {
        year: 'numeric',
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
    });
}

/**
 * Quality score column: "72" or "-" when unscored
 */
export function formatScore(score: number | '' | null | undefined): string {
    return typeof score === 'number' ? String(score) : '-';
}
