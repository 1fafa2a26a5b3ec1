/**
 * Auth CLI Commands
 * solarc auth login | logout | status
 */

import { Command } from 'commander';
import ora from 'ora';
import { errorMessage } from '../utils/errors.js';
import { log, maskToken, setVerbose } from '../utils/logger.js';
import { createTokenManager } from './shared.js';

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage the monitoring portal credential');

    auth.command('login')
        .description('Authenticate with username and encoded password, replacing the stored credential')
        .action(async () => {
            try {
                const manager = createTokenManager();
                const spinner = ora('Requesting access token...').start();
                const result = await manager.login();
                spinner.stop();

                if (!result.ok) {
                    log.error(`Authentication failed: ${result.error.message}`);
                    process.exitCode = 1;
                    return;
                }
                log.success(`Authenticated (token ${maskToken(result.token)})`);
            } catch (error) {
                log.error(`Authentication failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });

    auth.command('logout')
        .description('Clear the stored credential')
        .action(async () => {
            try {
                await createTokenManager().logout();
                log.success('Stored credential cleared');
            } catch (error) {
                log.error(`Logout failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });

    auth.command('status')
        .description('Show the stored credential state')
        .option('--check', 'Also obtain a usable token (refreshing or re-authenticating if needed)')
        .option('-v, --verbose', 'Show the transitions taken')
        .action(async (options: { check?: boolean; verbose?: boolean }) => {
            if (options.verbose) setVerbose(true);

            try {
                const manager = createTokenManager();
                const status = await manager.getStatus();

                if (status.state === 'NoCredential') {
                    log.warn('No usable stored credential. Run: solarc auth login');
                    if (status.problem) log.kv('Problem', status.problem);
                } else {
                    log.success(status.state === 'Usable' ? 'Credential usable' : 'Credential expired');
                    if (status.expiresAt) log.kv('Expires', status.expiresAt.toLocaleString());
                    if (status.renewAfter) log.kv('Renew After', status.renewAfter.toLocaleString());
                    log.kv('Can Refresh', status.canRefresh ? 'Yes' : 'No');
                }

                if (options.check) {
                    const result = await manager.getActiveAccessToken();
                    for (const step of manager.lastTrace) {
                        log.debug(`${step.transition}: ${step.outcome}${step.detail ? ` (${step.detail})` : ''}`);
                    }
                    if (result.ok) {
                        log.success(`Token ready (${maskToken(result.token)})`);
                    } else {
                        log.error(`Could not obtain a token: ${result.error.message}`);
                        process.exitCode = 1;
                    }
                }
            } catch (error) {
                log.error(`Status check failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });

    return auth;
}
