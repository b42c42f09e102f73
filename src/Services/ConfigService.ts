import Joi from 'joi';
import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import { ApplyEnvOverrides, type AppConfig, LoadConfig } from '../Config.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { ValidationError } from '../Common/Errors.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';

const configSchema = Joi.object<AppConfig>({
    gameRoot: Joi.string().min(1).required(),
    executable: Joi.string().min(1),
    modsDir: Joi.string().min(1),
    userDataRoot: Joi.string().min(1),
    stateDir: Joi.string().min(1),
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`),
})
    .unknown(true)
    .empty(null)
    .default({});

/** Default per-user data root of the game. */
export function DefaultUserDataRoot(home: string = homedir()): string {
    return join(home, `Documents`, `Paradox Interactive`, `Victoria II`);
}

function expandHome(path: string, home: string): string {
    if (path === `~`) {
        return home;
    }
    return path.startsWith(`~/`) || path.startsWith(`~\\`) ? join(home, path.slice(2)) : path;
}

/**
 * Validates raw settings and fills defaults. Pure apart from reading the home directory.
 * @throws ValidationError naming the offending field
 * @example
 * const cfg = ResolveConfig({ gameRoot: '/games/v2' });
 * cfg.modsDir; // '/games/v2/mod'
 */
export function ResolveConfig(raw: unknown, home: string = homedir()): ValidatedConfig {
    const { value, error } = configSchema.validate(raw);

    if (error || !value) {
        throw new ValidationError(`Config validation error: ${error ? error.message : `empty config`}`);
    }
    const gameRoot = resolve(expandHome(value.gameRoot ?? ``, home));
    const modsDir = resolve(gameRoot, expandHome(value.modsDir ?? `mod`, home));
    const userDataRoot = resolve(expandHome(value.userDataRoot ?? DefaultUserDataRoot(home), home));
    const stateDir = value.stateDir ? resolve(expandHome(value.stateDir, home)) : join(modsDir, `.launcher`);
    const executable = value.executable ?? `v2game.exe`;

    if (isAbsolute(executable)) {
        throw new ValidationError(`Config validation error: "executable" must be a file name inside gameRoot`, {
            executable,
        });
    }
    return { gameRoot, executable, modsDir, userDataRoot, stateDir, logLevel: value.logLevel ?? `info` };
}

/**
 * Service responsible for loading and validating application configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: MainEventBus;
    private _env: NodeJS.ProcessEnv;

    /**
     * Constructs a ConfigService.
     * @param eventBus MainEventBus - Event bus used for emitting `config.loaded`.
     * @param env NodeJS.ProcessEnv - Source of LAUNCHER_* overrides
     */
    constructor(eventBus: MainEventBus = MAIN_EVENT_BUS, env: NodeJS.ProcessEnv = process.env) {
        this._eventBus = eventBus;
        this._env = env;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * @param path string - Filesystem path to the config. Example: './launcher.config.yaml'
     * @returns Promise<ValidatedConfig> - The validated config object.
     * @throws IOError / ParseError when the file cannot be read, ValidationError when it is invalid
     * @example
     * const configService = new ConfigService(eventBus);
     * const config = await configService.Load('./launcher.config.yaml');
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        const rawConfig = await LoadConfig(path, this._env);
        return this.__finish(rawConfig);
    }

    /**
     * Builds the configuration from environment overrides alone, for runs without a config file.
     * @throws ValidationError when LAUNCHER_GAME_ROOT is not set
     */
    public FromEnvironment(): ValidatedConfig {
        return this.__finish(ApplyEnvOverrides({}, this._env));
    }

    private __finish(raw: Record<string, unknown>): ValidatedConfig {
        const validated = ResolveConfig(raw);
        this._eventBus.Emit(EVENT_NAMES.configLoaded, validated);
        return validated;
    }
}
