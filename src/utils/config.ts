/**
 * Config utility
 *
 * Resolution chain (highest priority wins):
 * 1. Environment variables (SUPABASE_URL, OAUTH_CLIENT_TOKEN_PATH, etc.)
 * 2. Global config file (~/.brainlift-mcp/config.json)
 * 3. Project-local .env (cwd fallback)
 *
 * Google client secrets and the saved Google token default to files inside
 * ~/.brainlift-mcp/ as well.
 */

import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { isLogLevel, type LogLevel } from './logger.js';

// ── Config Dir ──────────────────────────────────────

const CONFIG_DIR_NAME = '.brainlift-mcp';
const CONFIG_FILE_NAME = 'config.json';

export const DEFAULT_REDIRECT_PORT = 8080;

/**
 * Get config directory path (~/.brainlift-mcp/)
 */
export function getConfigDir(): string {
    const dir = path.join(process.env.HOME || process.env.USERPROFILE || '/tmp', CONFIG_DIR_NAME);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
}

function getConfigFilePath(): string {
    return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

// ── Saved Config (persistent) ───────────────────────

export const OWNERSHIP_MODES = ['filter', 'endpoint'] as const;
export type OwnershipMode = (typeof OWNERSHIP_MODES)[number];

const savedConfigSchema = z.object({
    supabaseUrl: z.string().optional(),
    supabaseAnonKey: z.string().optional(),
    apiUrl: z.string().optional(),
    clientSecretPath: z.string().optional(),
    tokenPath: z.string().optional(),
    redirectPort: z.number().int().optional(),
    ownership: z.enum(OWNERSHIP_MODES).optional(),
    demoMode: z.boolean().optional(),
});

export type SavedConfig = z.infer<typeof savedConfigSchema>;
export type SavedConfigKey = keyof SavedConfig;

/** Keys accepted by `brainlift config set` */
export const SAVED_CONFIG_KEYS = savedConfigSchema.keyof().options;

export function isSavedConfigKey(key: string): key is SavedConfigKey {
    return (SAVED_CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Read the saved global config file
 */
export function readSavedConfig(): SavedConfig | null {
    const configPath = getConfigFilePath();
    if (!fs.existsSync(configPath)) return null;

    try {
        const content = fs.readFileSync(configPath, 'utf8');
        const parsed = savedConfigSchema.safeParse(JSON.parse(content));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Write config to the global config file
 */
export function writeSavedConfig(config: SavedConfig): void {
    fs.writeFileSync(getConfigFilePath(), JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
}

/**
 * Update specific fields in the saved config
 */
export function updateSavedConfig(updates: SavedConfig): SavedConfig {
    const merged = { ...(readSavedConfig() ?? {}), ...updates };
    writeSavedConfig(merged);
    return merged;
}

/**
 * Parse a raw CLI value for a saved config key
 */
export function parseSavedConfigValue(key: SavedConfigKey, raw: string): SavedConfig {
    switch (key) {
        case 'redirectPort': {
            const value = Number(raw);
            if (!isValidPort(value)) {
                throw new Error(`Invalid value for ${key}: "${raw}" (expected a port number)`);
            }
            return { redirectPort: value };
        }
        case 'demoMode':
            return { demoMode: parseBoolean(raw) };
        case 'ownership':
            if (!isOwnershipMode(raw)) {
                throw new Error(`Invalid ownership mode "${raw}". Use one of: ${OWNERSHIP_MODES.join(', ')}`);
            }
            return { ownership: raw };
        default: {
            const updates: SavedConfig = {};
            updates[key] = raw;
            return updates;
        }
    }
}

// ── Resolved Config (runtime) ───────────────────────

export interface Config {
    demoMode: boolean;
    supabaseUrl: string;
    supabaseAnonKey: string;
    apiUrl: string;
    clientSecretPath: string;
    tokenPath: string;
    redirectPort: number;
    ownership: OwnershipMode;
    logLevel: LogLevel;
}

export function isOwnershipMode(value: string): value is OwnershipMode {
    return (OWNERSHIP_MODES as readonly string[]).includes(value);
}

function isValidPort(value: number): boolean {
    return Number.isInteger(value) && value > 0 && value <= 65535;
}

function parseBoolean(value: string | undefined): boolean {
    return ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase());
}

/**
 * Merge environment variables over the saved config.
 * Pure: no file or process access beyond the arguments.
 */
export function resolveConfig(env: NodeJS.ProcessEnv, saved: SavedConfig | null, configDir: string): Config {
    const demoMode = env.BRAINLIFT_DEMO_MODE !== undefined ? parseBoolean(env.BRAINLIFT_DEMO_MODE) : !!saved?.demoMode;

    const supabaseUrl = (env.SUPABASE_URL || saved?.supabaseUrl || '').replace(/\/+$/, '');
    const supabaseAnonKey = env.SUPABASE_ANON_KEY || saved?.supabaseAnonKey || '';

    if (!demoMode && (!supabaseUrl || !supabaseAnonKey)) {
        throw new Error(
            'BrainLift MCP is not configured.\n\n' +
                'Run this first:\n' +
                '  brainlift config set supabaseUrl https://<project>.supabase.co\n' +
                '  brainlift config set supabaseAnonKey <anon-key>\n\n' +
                'Or set environment variables:\n' +
                '  export SUPABASE_URL=...\n' +
                '  export SUPABASE_ANON_KEY=...\n\n' +
                'Set BRAINLIFT_DEMO_MODE=1 to try the tools with sample data.\n',
        );
    }

    const ownership = env.BRAINLIFT_OWNERSHIP || saved?.ownership || 'filter';
    if (!isOwnershipMode(ownership)) {
        throw new Error(`Invalid BRAINLIFT_OWNERSHIP "${ownership}". Use one of: ${OWNERSHIP_MODES.join(', ')}`);
    }

    const redirectPort = env.OAUTH_REDIRECT_PORT ? Number(env.OAUTH_REDIRECT_PORT) : saved?.redirectPort ?? DEFAULT_REDIRECT_PORT;
    if (!isValidPort(redirectPort)) {
        throw new Error(`Invalid OAUTH_REDIRECT_PORT "${env.OAUTH_REDIRECT_PORT}"`);
    }

    const logLevel = (env.BRAINLIFT_LOG_LEVEL || 'info').toLowerCase();
    if (!isLogLevel(logLevel)) {
        throw new Error(`Invalid BRAINLIFT_LOG_LEVEL "${env.BRAINLIFT_LOG_LEVEL}"`);
    }

    return {
        demoMode,
        supabaseUrl,
        supabaseAnonKey,
        apiUrl: (env.BRAINLIFT_API_URL || saved?.apiUrl || supabaseUrl).replace(/\/+$/, ''),
        clientSecretPath:
            env.OAUTH_CLIENT_SECRET_PATH || saved?.clientSecretPath || path.join(configDir, 'client-secrets.json'),
        tokenPath: env.OAUTH_CLIENT_TOKEN_PATH || saved?.tokenPath || path.join(configDir, 'google-token.json'),
        redirectPort,
        ownership,
        logLevel,
    };
}

let cachedConfig: Config | null = null;

/**
 * Resolve config using the priority chain:
 * 1. Environment variables
 * 2. Global config (~/.brainlift-mcp/config.json)
 * 3. Project-local .env
 */
export function getConfig(): Config {
    if (cachedConfig) return cachedConfig;

    // Layer 3: project-local .env as lowest priority
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }

    cachedConfig = resolveConfig(process.env, readSavedConfig(), getConfigDir());
    return cachedConfig;
}

/**
 * Clear the cached config (for testing or after config changes)
 */
export function clearConfigCache(): void {
    cachedConfig = null;
}
