/**
 * Derives the game invocation from the launcher settings, the enabled mods and the environment.
 */
import { promises as fs } from 'fs';
import path from 'path';
import type { LaunchCommand, PriorityClass } from '../Domain/Launch.js';
import type { Mod } from '../Domain/Mod.js';
import { EVENT_MODIFIERS_FRAGMENT, OVERRIDE_MOD_ID } from '../Domain/Mod.js';
import type { SettingsDocument, SettingValue } from '../Domain/Settings.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { ConfigError, ErrorMessage } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { EnsureOverrideMod, MergeEngine, type MergeReport } from '../Merge/MergeEngine.js';
import { LAUNCHER_KEYS } from '../Settings/Defaults.js';
import { getBool, getSettingOr, ReadFlag } from '../Settings/SettingsStore.js';
import { hasExecutable } from '../Game/GameLocator.js';

export interface LaunchBuilderOptions {
    /** Executable file name inside the game root. */
    executable?: string;
    /** Mods root; defaults to `<gameRoot>/mod`. */
    modsRoot?: string;
    mergeEngine?: MergeEngine;
    eventBus?: MainEventBus;
}

/** Minimum number of contributing mods for the override mod to be loaded. */
export const MIN_MERGE_CONTRIBUTORS = 2;

/**
 * Priority class for a `realtime` setting.
 * 1, "1", yes and true mean realtime; 0, "0", no and false mean high; anything else, or no
 * setting at all, means normal.
 * @example
 * PriorityFromSetting(1); // 'realtime'
 * PriorityFromSetting('1'); // 'realtime'
 * PriorityFromSetting(undefined); // 'normal'
 */
export function PriorityFromSetting(value: SettingValue | undefined): PriorityClass {
    const flag = ReadFlag(value);
    if (flag === true) {
        return `realtime`;
    }
    return flag === false ? `high` : `normal`;
}

/**
 * Builds LaunchCommands, rebuilding the merged event modifiers on the way.
 */
export class LaunchCommandBuilder {
    private _executable: string;
    private _modsRoot?: string;
    private _mergeEngine: MergeEngine;
    private _eventBus: MainEventBus;
    /** Report of the merge run by the last Build, if any. */
    public lastMerge: MergeReport | null = null;

    constructor(options: LaunchBuilderOptions = {}) {
        this._executable = options.executable ?? `v2game.exe`;
        this._modsRoot = options.modsRoot;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this._mergeEngine = options.mergeEngine ?? new MergeEngine(this._eventBus);
    }

    /**
     * Builds the command that starts the game with enabledMods.
     * @param settings SettingsDocument - Launcher settings (`realtime`, `merge_event_modifiers`)
     * @param enabledMods Mod[] - Enabled mods in load order
     * @param gameRoot string - Game installation directory, also the working directory
     * @param userDir string - Absolute user directory the game will write to; created when missing
     * @throws ConfigError when the executable is missing or userDir cannot be created
     * @throws MergeConflictError when an enabled mod's event modifiers cannot be merged
     * @example
     * const command = await builder.Build(settings, enabledInOrder(list), '/games/v2', userDirPath);
     */
    public async Build(settings: SettingsDocument, enabledMods: readonly Mod[], gameRoot: string, userDir: string): Promise<LaunchCommand> {
        const executable = path.join(gameRoot, this._executable);
        if (!(await hasExecutable(gameRoot, this._executable))) {
            throw new ConfigError(`Game executable not found: ${executable}`, { path: executable });
        }
        try {
            await fs.mkdir(userDir, { recursive: true });
        } catch (err) {
            throw new ConfigError(`Cannot create user directory ${userDir}: ${ErrorMessage(err)}`, { path: userDir }, err);
        }

        const modsRoot = this._modsRoot ?? path.join(gameRoot, `mod`);
        const prefix = path.relative(gameRoot, modsRoot).split(path.sep).join(`/`);
        const args = enabledMods.map(mod => {
            return `-mod=${prefix}/${mod.descriptorFile}`;
        });

        this.lastMerge = null;
        if (getBool(settings, LAUNCHER_KEYS.mergeEventModifiers, true) && enabledMods.length > 0) {
            await EnsureOverrideMod(modsRoot);
            const outputPath = path.join(modsRoot, OVERRIDE_MOD_ID, ...EVENT_MODIFIERS_FRAGMENT.split(`/`));
            this.lastMerge = await this._mergeEngine.Merge(enabledMods, outputPath);
            if (this.lastMerge.contributors.length >= MIN_MERGE_CONTRIBUTORS) {
                args.push(`-mod=${prefix}/${OVERRIDE_MOD_ID}.mod`);
            }
        }

        const realtime = getSettingOr(settings, LAUNCHER_KEYS.realtime, ``);
        const command: LaunchCommand = {
            executable,
            workingDirectory: gameRoot,
            args,
            priority: PriorityFromSetting(realtime),
        };
        log.info(`Launch command: ${[executable, ...args].join(` `)} (${command.priority} priority)`, `LaunchCommandBuilder`);
        this._eventBus.Emit(EVENT_NAMES.launchBuilt, command);
        return command;
    }
}
