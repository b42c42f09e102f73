/**
 * Console front end. Reads commands from stdin, drives the Launcher facade and prints the views it
 * returns.
 */
import { FormatError, SystemErrorCode, IOError, ValidationError } from './Common/Errors.js';
import { log, SetLogLevel } from './Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from './Events/MainEventBus.js';
import { EVENT_NAMES } from './Domain/Utility.js';
import type { LoadOrderView } from './Domain/LoadOrder.js';
// ConfigService handles loading and validating config
import { ConfigService, ResolveConfig } from './Services/ConfigService.js';
import { ConfigPath } from './Config.js';
import type { ValidatedConfig } from './Types/Config.js';
import { Launcher, type LauncherOptions } from './Services/Launcher.js';
import { AvailableDrives, defaultGameRootCandidates, findGameRoot } from './Game/GameLocator.js';
import { ParseSettingValue } from './Settings/SettingsParser.js';

/** Console help text, one command per line. */
export const HELP_LINES = [
    `list                      show the load order`,
    `enable <id> | disable <id>`,
    `move <id> <position>      move a mod (0 is first)`,
    `sort                      order enabled mods by their dependencies`,
    `presets                   list presets`,
    `preset save|apply|delete <name>`,
    `settings                  show launcher settings`,
    `set <key> <value>         change a launcher setting`,
    `launch                    start the game`,
    `clear-cache               delete map, gfx and music caches`,
    `saves                     show the save-game folder`,
    `quit`,
];

/** Renders load-order rows as aligned text. */
export function FormatView(rows: readonly LoadOrderView[]): string[] {
    if (rows.length === 0) {
        return [`(no mods installed)`];
    }
    return rows.map(row => {
        const order = row.loadIndex === null ? `  -` : String(row.loadIndex + 1).padStart(3, ` `);
        return `${row.enabled ? `[x]` : `[ ]`} ${order}  ${row.id}${row.name !== row.id ? ` (${row.name})` : ``}`;
    });
}

/**
 * Application entry point for the console launcher.
 */
export class LauncherApp {
    /**
     * Event bus shared with the launcher core.
     */
    public eventBus: MainEventBus;

    /** Service for loading and validating app config [// ConfigService instance] */
    private _configService: ConfigService;
    private _launcher: Launcher | null = null;
    private _options: LauncherOptions;
    private _output: (line: string) => void;

    /**
     * Indicates if the app is running [// boolean flag for main loop]
     */
    private _running: boolean = false;

    public constructor(
        eventBus: MainEventBus = MAIN_EVENT_BUS,
        options: LauncherOptions = {},
        output: (line: string) => void = line => {
            console.log(line);
        },
    ) {
        this.eventBus = eventBus;
        this._options = { ...options, eventBus };
        this._output = output;
        this._configService = new ConfigService(this.eventBus);
        this.__setupEventHandlers();
    }

    /**
     * Loads the config file; without one, falls back to LAUNCHER_* variables, then to searching the
     * usual install locations.
     * @private
     */
    private async __loadConfig(): Promise<ValidatedConfig> {
        const configPath = ConfigPath();
        try {
            return await this._configService.Load(configPath);
        } catch (err) {
            if (!(err instanceof IOError) || SystemErrorCode(err.cause) !== `ENOENT`) {
                throw err;
            }
            log.info(`No config file at ${configPath}; using environment`, `App`);
        }
        try {
            return this._configService.FromEnvironment();
        } catch (err) {
            if (!(err instanceof ValidationError)) {
                throw err;
            }
        }
        const gameRoot = await findGameRoot(defaultGameRootCandidates(process.cwd(), await AvailableDrives()), `v2game.exe`);
        if (!gameRoot) {
            throw new ValidationError(`Game not found; set gameRoot in ${configPath} or LAUNCHER_GAME_ROOT`);
        }
        log.info(`Found game at ${gameRoot}`, `App`);
        return ResolveConfig({ gameRoot });
    }

    /**
     * Sets up listeners that echo core events to the console.
     * @private
     */
    private __setupEventHandlers(): void {
        this.eventBus.On(EVENT_NAMES.mergeOverride, ({ blockId, previous, next }) => {
            this._output(`Event modifier '${blockId}' from ${previous} is overridden by ${next}`);
        });
        this.eventBus.On(EVENT_NAMES.catalogWarning, warning => {
            this._output(`Warning: ${warning.message}`);
        });
    }

    private __launcher(): Launcher {
        if (!this._launcher) {
            throw new ValidationError(`Launcher is not started`);
        }
        return this._launcher;
    }

    /**
     * Runs one console command.
     * @param input string - The input line, e.g. `move PDM 0`
     * @returns Promise<void>
     */
    public async HandleInput(input: string): Promise<void> {
        const [word = ``, ...rest] = input.trim().split(/\s+/);
        const command = word.toLowerCase();
        const launcher = this.__launcher();

        switch (command) {
            case ``:
                return;
            case `help`:
                HELP_LINES.forEach(this._output);
                return;
            case `list`:
                FormatView(launcher.View()).forEach(this._output);
                return;
            case `enable`:
            case `disable`:
                FormatView(await launcher.Enable(this.__arg(rest, 0, `id`), command === `enable`)).forEach(this._output);
                return;
            case `move`: {
                const position = Number(this.__arg(rest, 1, `position`));
                if (!Number.isInteger(position)) {
                    throw new ValidationError(`Position must be a whole number`);
                }
                FormatView(await launcher.Move(this.__arg(rest, 0, `id`), position)).forEach(this._output);
                return;
            }
            case `sort`:
                FormatView(await launcher.AutoSort()).forEach(this._output);
                return;
            case `presets`: {
                const names = await launcher.Presets();
                (names.length > 0 ? names : [`(no presets)`]).forEach(this._output);
                return;
            }
            case `preset`:
                await this.__preset(launcher, rest);
                return;
            case `settings`:
                launcher.Settings().forEach(({ key, value }) => {
                    this._output(`${key} = ${String(value)}`);
                });
                return;
            case `set`: {
                const key = this.__arg(rest, 0, `key`);
                const { value } = ParseSettingValue(rest.slice(1).join(` `));
                await launcher.SetSetting(key, value);
                this._output(`${key} = ${String(value)}`);
                return;
            }
            case `launch`:
                await this.__launch(launcher);
                return;
            case `clear-cache`: {
                const removed = await launcher.ClearCache();
                this._output(removed.length > 0 ? `Removed ${removed.join(`, `)}` : `Nothing to clear`);
                return;
            }
            case `saves`:
                this._output(await launcher.SavesDir());
                return;
            case `quit`:
            case `exit`:
                this._running = false;
                return;
            default:
                this._output(`Unknown command '${command}'; type help`);
        }
    }

    private __arg(args: readonly string[], index: number, name: string): string {
        const value = args[index];
        if (!value) {
            throw new ValidationError(`Missing ${name}`);
        }
        return value;
    }

    private async __preset(launcher: Launcher, args: readonly string[]): Promise<void> {
        const action = this.__arg(args, 0, `action`);
        const name = args.slice(1).join(` `);
        switch (action) {
            case `save`:
                await launcher.SavePreset(name);
                this._output(`Saved preset '${name.trim()}'`);
                return;
            case `apply`:
                FormatView(await launcher.ApplyPreset(name)).forEach(this._output);
                return;
            case `delete`:
                await launcher.DeletePreset(name);
                this._output(`Deleted preset '${name}'`);
                return;
            default:
                throw new ValidationError(`Unknown preset action '${action}'`);
        }
    }

    private async __launch(launcher: Launcher): Promise<void> {
        const game = await launcher.Launch();
        this._output(game.pid === undefined ? `Game started` : `Game started (pid ${game.pid})`);
        void game.exited.then(
            result => {
                this._output(`Game exited with code ${result.exitCode === null ? `none` : result.exitCode}`);
            },
            (err: unknown) => {
                this._output(FormatError(err));
            },
        );
    }

    /**
     * Starts the main IO loop, reading from stdin.
     * @returns Promise<void> - Settles when the user quits or stdin closes
     */
    public async Start(): Promise<void> {
        const config = await this.__loadConfig();
        SetLogLevel(config.logLevel);
        this._launcher = new Launcher(config, this._options);
        await this._launcher.Refresh();
        FormatView(this._launcher.View()).forEach(this._output);
        this._output(`Type help for commands.`);
        this._running = true;

        // Read from stdin asynchronously
        for await (const line of this.__readLines()) {
            try {
                await this.HandleInput(line);
            } catch (err) {
                this._output(FormatError(err));
            }
            if (!this._running) {
                break;
            }
        }
        await this._launcher.Shutdown();
    }

    /**
     * Attaches a launcher built elsewhere, for driving HandleInput without stdin.
     */
    public Attach(launcher: Launcher): void {
        this._launcher = launcher;
        this._running = true;
    }

    /** False once `quit` was entered. */
    public get Running(): boolean {
        return this._running;
    }

    /**
     * Async generator to read lines from stdin.
     * @returns AsyncGenerator<string, void, unknown>
     * @example
     * for await (const line of this.__readLines()) { ... }
     */
    private async *__readLines(): AsyncGenerator<string, void, unknown> {
        const readline = await import(`readline`);
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
            terminal: process.stdin.isTTY === true,
        });

        try {
            for await (const line of rl) {
                yield line;
            }
        } finally {
            rl.close();
        }
    }
}
