/**
 * Config CLI Commands
 * brainlift config show | set <key> <value> | path
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import {
    SAVED_CONFIG_KEYS,
    clearConfigCache,
    getConfigDir,
    isSavedConfigKey,
    parseSavedConfigValue,
    readSavedConfig,
    resolveConfig,
    updateSavedConfig,
} from '../utils/config.js';
import { fail } from './shared.js';

function mask(secret: string): string {
    return secret ? '••••••' + secret.slice(-4) : '(not set)';
}

export function createConfigCommand(): Command {
    const config = new Command('config').description('Manage BrainLift MCP configuration');

    // ── config show ──────────────────────────────────
    config
        .command('show')
        .description('Show the effective configuration (environment over ~/.brainlift-mcp/config.json)')
        .action(() => {
            try {
                const resolved = resolveConfig(process.env, readSavedConfig(), getConfigDir());

                log.header('BrainLift MCP Configuration');
                log.kv('Demo Mode', resolved.demoMode ? 'on' : 'off');
                log.kv('Supabase URL', resolved.supabaseUrl || '(not set)');
                log.kv('Supabase Anon Key', mask(resolved.supabaseAnonKey));
                log.kv('API URL', resolved.apiUrl || '(not set)');
                log.kv('Ownership Mode', resolved.ownership);
                log.kv('Client Secrets', resolved.clientSecretPath);
                log.kv('Token File', resolved.tokenPath);
                log.kv('Redirect URI', `http://localhost:${resolved.redirectPort}/`);
                log.kv('Log Level', resolved.logLevel);
            } catch (error) {
                fail('Could not resolve configuration', error);
            }
        });

    // ── config set ───────────────────────────────────
    config
        .command('set <key> <value>')
        .description(`Save a value to ~/.brainlift-mcp/config.json (keys: ${SAVED_CONFIG_KEYS.join(', ')})`)
        .action((key: string, value: string) => {
            try {
                if (!isSavedConfigKey(key)) {
                    throw new Error(`Unknown config key "${key}". Valid keys: ${SAVED_CONFIG_KEYS.join(', ')}`);
                }
                updateSavedConfig(parseSavedConfigValue(key, value));
                clearConfigCache();
                log.success(`Saved ${key}`);
            } catch (error) {
                fail('Could not save configuration', error);
            }
        });

    // ── config path ──────────────────────────────────
    config
        .command('path')
        .description('Print the configuration directory')
        .action(() => {
            console.log(getConfigDir());
        });

    return config;
}
