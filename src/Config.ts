/**
 * Loads the launcher configuration file and layers environment overrides on top of it.
 * Validation and defaults live in ConfigService.
 */

import { readConfigFile } from './Common/ConfigReader.js';
import { ValidationError } from './Common/Errors.js';

/**
 * Configuration as written by the user; every field optional until validated.
 * @property {string} [gameRoot] - Game installation directory
 * @property {string} [executable] - Executable name inside gameRoot (default `v2game.exe`)
 * @property {string} [modsDir] - Mods root, relative to gameRoot or absolute (default `mod`)
 * @property {string} [userDataRoot] - Root of per-user game data; `~` expands to the home directory
 * @property {string} [stateDir] - Launcher state directory (default `<modsDir>/.launcher`)
 * @property {('debug'|'info'|'warn'|'error')} [logLevel] - Logging verbosity (default 'info')
 */
export interface AppConfig {
    gameRoot?: string;
    executable?: string;
    modsDir?: string;
    userDataRoot?: string;
    stateDir?: string;
    logLevel?: `debug` | `info` | `warn` | `error`;
}

/** Config file used when CONFIG_PATH is not set. */
export const DEFAULT_CONFIG_PATH = `./launcher.config.yaml`;

/** Environment variable -> config field; environment wins over the file. */
export const ENV_OVERRIDES = {
    LAUNCHER_GAME_ROOT: `gameRoot`,
    LAUNCHER_USER_DATA_ROOT: `userDataRoot`,
    LAUNCHER_STATE_DIR: `stateDir`,
    LAUNCHER_LOG_LEVEL: `logLevel`,
} as const satisfies Record<string, keyof AppConfig>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/** Path of the config file: CONFIG_PATH, else DEFAULT_CONFIG_PATH. */
export function ConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    return env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
}

/**
 * Copies raw and applies ENV_OVERRIDES. An empty document counts as `{}`.
 * @throws ValidationError when raw is not a mapping
 */
export function ApplyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
    if (raw !== null && raw !== undefined && !isRecord(raw)) {
        throw new ValidationError(`Config must be a mapping of settings`);
    }
    const merged: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};
    for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
        const value = env[variable];
        if (value) {
            merged[field] = value;
        }
    }
    return merged;
}

/**
 * Reads the configuration file (JSON or YAML) and applies environment overrides.
 * @param configPath string - Path to configuration file
 * @returns Promise<Record<string, unknown>> - Unvalidated settings
 * @example
 * const raw = await LoadConfig('./launcher.config.yaml');
 */
export async function LoadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<Record<string, unknown>> {
    const parsedConfig = await readConfigFile(configPath);
    return ApplyEnvOverrides(parsedConfig, env);
}
