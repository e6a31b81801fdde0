/**
 * @fileoverview Configuration loading: file location, validation and
 * environment overrides.
 * @module config/loadConfig
 * @version 1.0.0
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../types/app-errors';
import { ConfigSchema, formatZodIssues } from './schema';
import type { AppConfig } from './schema';

export const DEFAULT_CONFIG_FILE = 'minaret.config.json';

export const CONFIG_ENV = {
    CONFIG_PATH: 'MINARET_CONFIG',
    GATEWAY_TOKEN: 'MINARET_GATEWAY_TOKEN',
    SERVER_TOKEN: 'MINARET_SERVER_TOKEN',
    DEBUG: 'MINARET_DEBUG',
} as const;

export type Environment = Record<string, string | undefined>;

export interface LoadedConfig {
    config: AppConfig;
    /** Absolute path of the file the config came from */
    path: string;
}

/**
 * Config file path: `--config <path>` / `--config=<path>`, then
 * `MINARET_CONFIG`, then `minaret.config.json` in the working directory.
 */
export function resolveConfigPath(argv: readonly string[], env: Environment, cwd: string = process.cwd()): string {
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === undefined) {
            continue;
        }
        if (arg.startsWith('--config=')) {
            return path.resolve(cwd, arg.slice('--config='.length));
        }
        const value = argv[i + 1];
        if (arg === '--config' && value !== undefined) {
            return path.resolve(cwd, value);
        }
    }
    return path.resolve(cwd, env[CONFIG_ENV.CONFIG_PATH] ?? DEFAULT_CONFIG_FILE);
}

/**
 * Validate raw JSON, apply environment overrides and resolve file paths
 * against `baseDir`.
 * @throws ConfigError
 */
export function parseConfig(raw: unknown, env: Environment, baseDir: string): AppConfig {
    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatZodIssues(parsed.error.issues)}`);
    }
    const config = parsed.data;

    const gatewayToken = env[CONFIG_ENV.GATEWAY_TOKEN];
    const serverToken = env[CONFIG_ENV.SERVER_TOKEN];
    return {
        ...config,
        gateway: { ...config.gateway, token: gatewayToken || config.gateway.token },
        server: { ...config.server, token: serverToken || config.server.token },
        logging: { debug: env[CONFIG_ENV.DEBUG] === '1' || config.logging.debug },
        cache: { ...config.cache, dir: path.resolve(baseDir, config.cache.dir) },
        stateFile: path.resolve(baseDir, config.stateFile),
    };
}

/**
 * Locate, read and validate the configuration file.
 * @throws ConfigError when the file is missing, unreadable or invalid
 */
export async function loadConfig(
    argv: readonly string[] = process.argv.slice(2),
    env: Environment = process.env
): Promise<LoadedConfig> {
    const configPath = resolveConfigPath(argv, env);

    let text: string;
    try {
        text = await fs.readFile(configPath, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Cannot read configuration file ${configPath}: ${reason}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        throw new ConfigError(`Configuration file ${configPath} is not valid JSON`);
    }

    return { config: parseConfig(raw, env, path.dirname(configPath)), path: configPath };
}
