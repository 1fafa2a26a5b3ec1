/**
 * Logger utility
 * Chalk-based colored console output
 */

import chalk from 'chalk';

let verbose = process.env.SOLAR_DEBUG === '1';

export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function isVerbose(): boolean {
    return verbose;
}

export const log = {
    info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
    success: (msg: string) => console.log(chalk.green('✔'), msg),
    warn: (msg: string) => console.warn(chalk.yellow('⚠'), msg),
    error: (msg: string) => console.error(chalk.red('✖'), msg),
    dim: (msg: string) => console.log(chalk.dim(msg)),
    bold: (msg: string) => console.log(chalk.bold(msg)),

    debug: (msg: string) => {
        if (verbose) console.log(chalk.dim(`· ${msg}`));
    },

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

/**
 * Shortens a credential for display: first 6 characters and an ellipsis.
 */
export function maskToken(token: string | undefined | null): string {
    if (!token) return 'N/A';
    return token.length <= 6 ? '••••••' : `${token.slice(0, 6)}…`;
}
