/**
 * Auth CLI Commands
 * brainlift auth login | logout | status | whoami
 */

import { Command } from 'commander';
import open from 'open';
import ora, { type Ora } from 'ora';
import { getConfig } from '../utils/config.js';
import { log, logger } from '../utils/logger.js';
import { BrainliftClient } from '../client/BrainliftClient.js';
import { createClient, fail } from './shared.js';

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage Google sign-in for BrainLift');

    auth.command('login')
        .description('Sign in with Google in the browser and save the credentials')
        .action(async () => {
            const progress: { spinner?: Ora } = {};
            try {
                const config = getConfig();
                logger.setLevel(config.logLevel === 'info' ? 'warn' : config.logLevel);

                const client = new BrainliftClient({
                    ...config,
                    interactive: true,
                    openUrl: async (url) => {
                        log.info('Opening browser for Google sign-in...');
                        log.dim(`  ${url}`);
                        await open(url);
                        progress.spinner = ora('Waiting for authentication...').start();
                    },
                });

                await client.login();
                progress.spinner?.stop();

                const status = await client.getAuthStatus();
                log.success('Signed in with Google');
                if (status.expiresAt) {
                    log.kv('Token Expires', status.expiresAt.toLocaleString());
                }

                if (!config.demoMode) {
                    const me = await client.whoami();
                    log.kv('BrainLift User', me.userId);
                }
            } catch (error) {
                progress.spinner?.fail();
                fail('Authentication failed', error);
            }
        });

    auth.command('logout')
        .description('Revoke and delete stored credentials')
        .action(async () => {
            try {
                await createClient().logout();
                log.success('Logged out successfully');
            } catch (error) {
                fail('Logout failed', error);
            }
        });

    auth.command('status')
        .description('Show current authentication status')
        .action(async () => {
            try {
                const client = createClient();
                const status = await client.getAuthStatus();

                if (client.demoMode) {
                    log.info('Demo mode is on; no sign-in is needed');
                }

                if (!status.authenticated) {
                    log.warn('Not authenticated. Run: brainlift auth login');
                    return;
                }

                log.success('Authenticated');
                if (status.expiresAt) {
                    log.kv('Token Expires', status.expiresAt.toLocaleString());
                }
                log.kv('Expired', status.isExpired ? 'Yes' : 'No');
                log.kv('Can Refresh', status.canRefresh ? 'Yes' : 'No');
                log.kv('ID Token', status.hasIdToken ? 'Yes' : 'No');
            } catch (error) {
                fail('Status check failed', error);
            }
        });

    auth.command('whoami')
        .description('Exchange the Google credentials and show the BrainLift user id')
        .action(async () => {
            try {
                const me = await createClient().whoami();
                log.kv('User ID', me.userId);
                if (me.demo) log.dim('  (demo mode)');
            } catch (error) {
                fail('Could not resolve user', error);
            }
        });

    return auth;
}
