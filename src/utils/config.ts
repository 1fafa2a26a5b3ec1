/**
 * Config utility
 *
 * Resolution chain (highest priority wins):
 * 1. Environment variables (SIGEN_USERNAME, INFLUXDB_TOKEN, etc.)
 * 2. Global config file (~/.solar-collector/config.json)
 * 3. Project-local .env (cwd fallback)
 *
 * Persistent config lives at ~/.solar-collector/config.json
 * The credential record lives at ~/.solar-collector/token.json unless SIGEN_TOKEN_FILE says otherwise
 */

import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isValidTimeZone } from './dates.js';

// ── Defaults ────────────────────────────────────────

export const DEFAULT_TOKEN_URL = 'https://api-eu.sigencloud.com/auth/oauth/token';
export const DEFAULT_BASE_URL = 'https://api-eu.sigencloud.com';
// "sigen:sigen", the portal's public client credential
export const DEFAULT_CLIENT_AUTH = 'c2lnZW46c2lnZW4=';
export const DEFAULT_INFLUX_URL = 'http://localhost:8086';
export const DEFAULT_TIMEZONE = 'Europe/Dublin';

// ── Config Dir ──────────────────────────────────────

const CONFIG_DIR_NAME = '.solar-collector';
const CONFIG_FILE_NAME = 'config.json';
const TOKEN_FILE_NAME = 'token.json';

type Env = Record<string, string | undefined>;

function configDirPath(env: Env = process.env): string {
    return path.join(env.HOME || env.USERPROFILE || '/tmp', CONFIG_DIR_NAME);
}

/**
 * Get config directory path (~/.solar-collector/), creating it if needed
 */
export function getConfigDir(): string {
    const dir = configDirPath();
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
}

export function getConfigFilePath(): string {
    return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

// ── Saved Config (persistent) ───────────────────────

export const SavedConfigSchema = z.object({
    username: z.string().optional(),
    encodedPassword: z.string().optional(),
    clientAuth: z.string().optional(),
    tokenUrl: z.string().optional(),
    baseUrl: z.string().optional(),
    stationId: z.string().optional(),
    tokenFile: z.string().optional(),
    tokenStore: z.enum(['file', 'env']).optional(),
    timezone: z.string().optional(),
    influx: z
        .object({
            url: z.string().optional(),
            token: z.string().optional(),
            org: z.string().optional(),
            bucket: z.string().optional(),
        })
        .optional(),
    weather: z
        .object({
            latitude: z.union([z.number(), z.string()]).optional(),
            longitude: z.union([z.number(), z.string()]).optional(),
            timezone: z.string().optional(),
        })
        .optional(),
});

export type SavedConfig = z.infer<typeof SavedConfigSchema>;

/**
 * Keys accepted by `solarc config set`, in dotted form
 */
export const SETTABLE_KEYS = [
    'username',
    'encodedPassword',
    'clientAuth',
    'tokenUrl',
    'baseUrl',
    'stationId',
    'tokenFile',
    'tokenStore',
    'timezone',
    'influx.url',
    'influx.token',
    'influx.org',
    'influx.bucket',
    'weather.latitude',
    'weather.longitude',
    'weather.timezone',
] as const;

export type SettableKey = (typeof SETTABLE_KEYS)[number];

export function isSettableKey(key: string): key is SettableKey {
    return (SETTABLE_KEYS as readonly string[]).includes(key);
}

/**
 * Read the saved global config file
 */
export function readSavedConfig(): SavedConfig | null {
    const configPath = path.join(configDirPath(), CONFIG_FILE_NAME);
    if (!fs.existsSync(configPath)) return null;

    try {
        const content = fs.readFileSync(configPath, 'utf8');
        const parsed = SavedConfigSchema.safeParse(JSON.parse(content));
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
 * Set a single dotted key in a saved config, returning a new object
 */
export function applySetting(current: SavedConfig, key: SettableKey, value: string): SavedConfig {
    const [section, field] = key.split('.');
    const next =
        field && (section === 'influx' || section === 'weather')
            ? { ...current, [section]: { ...current[section], [field]: value } }
            : { ...current, [key]: value };

    const parsed = SavedConfigSchema.safeParse(next);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigError(`Invalid value for ${key}: ${issue ? issue.message : value}`);
    }
    return parsed.data;
}

/**
 * Update a single key in the saved config file
 */
export function updateSavedConfig(key: SettableKey, value: string): SavedConfig {
    const merged = applySetting(readSavedConfig() || {}, key, value);
    writeSavedConfig(merged);
    return merged;
}

// ── Resolved Config (runtime) ───────────────────────

const optionalText = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined));

const coordinate = (min: number, max: number) =>
    z.coerce.number().min(min).max(max).optional();

const timeZone = z.string().refine(isValidTimeZone, (value) => ({ message: `Unknown time zone "${value}"` }));

export const ConfigSchema = z.object({
    auth: z.object({
        username: optionalText,
        encodedPassword: optionalText,
        clientAuth: z.string().min(1),
        tokenUrl: z.string().url(),
    }),
    baseUrl: z.string().url(),
    stationId: optionalText,
    tokenFile: z.string().min(1),
    tokenStore: z.enum(['file', 'env']),
    influx: z.object({
        url: z.string().url(),
        token: optionalText,
        org: optionalText,
        bucket: optionalText,
    }),
    weather: z.object({
        latitude: coordinate(-90, 90),
        longitude: coordinate(-180, 180),
        timezone: timeZone,
    }),
    timezone: timeZone,
});

export type Config = z.infer<typeof ConfigSchema>;

function pick(env: Env, name: string): string | undefined {
    const value = env[name];
    return value && value.trim() ? value.trim() : undefined;
}

/**
 * Merge environment variables over the saved config and validate the result.
 * Credentials may be absent here; the token manager reports that at use.
 */
export function resolveConfig(env: Env, saved: SavedConfig | null): Config {
    const timezone = pick(env, 'TIMEZONE') || saved?.timezone || DEFAULT_TIMEZONE;

    const candidate = {
        auth: {
            username: pick(env, 'SIGEN_USERNAME') || saved?.username,
            encodedPassword: pick(env, 'SIGEN_PASSWORD_ENCODED') || saved?.encodedPassword,
            clientAuth: pick(env, 'SIGEN_CLIENT_AUTH') || saved?.clientAuth || DEFAULT_CLIENT_AUTH,
            tokenUrl: pick(env, 'SIGEN_TOKEN_URL') || saved?.tokenUrl || DEFAULT_TOKEN_URL,
        },
        baseUrl: pick(env, 'SIGEN_BASE_URL') || saved?.baseUrl || DEFAULT_BASE_URL,
        stationId: pick(env, 'SIGEN_STATION_ID') || saved?.stationId,
        tokenFile:
            pick(env, 'SIGEN_TOKEN_FILE') || saved?.tokenFile || path.join(configDirPath(env), TOKEN_FILE_NAME),
        tokenStore: pick(env, 'SIGEN_TOKEN_STORE') || saved?.tokenStore || 'file',
        influx: {
            url: pick(env, 'INFLUXDB_URL') || saved?.influx?.url || DEFAULT_INFLUX_URL,
            token: pick(env, 'INFLUXDB_TOKEN') || saved?.influx?.token,
            org: pick(env, 'INFLUXDB_ORG') || saved?.influx?.org,
            bucket: pick(env, 'INFLUXDB_BUCKET') || saved?.influx?.bucket,
        },
        weather: {
            latitude: pick(env, 'WEATHER_LATITUDE') ?? saved?.weather?.latitude,
            longitude: pick(env, 'WEATHER_LONGITUDE') ?? saved?.weather?.longitude,
            timezone: pick(env, 'WEATHER_TIMEZONE') || saved?.weather?.timezone || timezone,
        },
        timezone,
    };

    const parsed = ConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration:\n${issues.join('\n')}`);
    }
    return parsed.data;
}

let cachedConfig: Config | null = null;

/**
 * Resolve config using the priority chain:
 * 1. Environment variables
 * 2. Global config (~/.solar-collector/config.json)
 * 3. Project-local .env
 */
export function getConfig(): Config {
    if (cachedConfig) return cachedConfig;

    // Layer 3: Try loading project-local .env as lowest priority
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }

    cachedConfig = resolveConfig(process.env, readSavedConfig());
    return cachedConfig;
}

/**
 * Clear the cached config (for testing or after config changes)
 */
export function clearConfigCache(): void {
    cachedConfig = null;
}
