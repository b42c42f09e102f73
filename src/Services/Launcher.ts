/**
 * Facade the front ends drive: one object holding the current catalog, load order and launcher
 * settings, persisting the load order after every change.
 */
import type { CatalogScanResult, ModCatalog } from '../Domain/Mod.js';
import type { LoadOrderList, LoadOrderState, LoadOrderView } from '../Domain/LoadOrder.js';
import type { SettingsDocument, SettingValue } from '../Domain/Settings.js';
import type { Preset } from '../Domain/Preset.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { ConfigError, ParseError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { scanCatalog } from '../Catalog/ModCatalog.js';
import {
    emptyLoadOrder,
    enabledInOrder,
    fromCatalog,
    moveTo,
    resolveUserDir,
    setEnabled,
    sortByDependencies,
    toView,
} from '../LoadOrder/LoadOrderList.js';
import { persist, restore } from '../LoadOrder/LoadOrderStore.js';
import { PresetManager } from '../Presets/PresetManager.js';
import { DEFAULT_LAUNCHER_SETTINGS, LAUNCHER_KEYS } from '../Settings/Defaults.js';
import { syncGameSettings } from '../Settings/GameSettings.js';
import { getBool, listSettings, loadOrCreateSettings, patchSetting, writeSettings } from '../Settings/SettingsStore.js';
import { LaunchCommandBuilder } from '../Launch/LaunchCommandBuilder.js';
import { LaunchRunner, type PriorityFunction, type RunningGame, type SpawnFunction } from '../Launch/LaunchRunner.js';
import { applySkipIntro, clearCache, savesDir } from '../Game/GameFolders.js';
import { PathManager } from './PathManager.js';
import { UpdateChecker, type UpdateCallback, type UpdateSource } from './UpdateChecker.js';

export interface LauncherOptions {
    eventBus?: MainEventBus;
    spawn?: SpawnFunction;
    setPriority?: PriorityFunction;
    updateSource?: UpdateSource;
}

export class Launcher {
    private _paths: PathManager;
    private _eventBus: MainEventBus;
    private _presets: PresetManager;
    private _builder: LaunchCommandBuilder;
    private _runner: LaunchRunner;
    private _updates: UpdateChecker | null;
    private _catalog: ModCatalog = [];
    private _list: LoadOrderList = emptyLoadOrder();
    private _settings: SettingsDocument | null = null;

    /**
     * @example
     * const launcher = new Launcher(config);
     * await launcher.Refresh();
     */
    constructor(config: ValidatedConfig, options: LauncherOptions = {}) {
        this._paths = new PathManager(config);
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this._presets = new PresetManager(this._paths.PresetsFile(), { eventBus: this._eventBus });
        this._builder = new LaunchCommandBuilder({
            executable: config.executable,
            modsRoot: this._paths.ModsRoot(),
            eventBus: this._eventBus,
        });
        this._runner = new LaunchRunner({ spawn: options.spawn, setPriority: options.setPriority, eventBus: this._eventBus });
        this._updates = options.updateSource ? new UpdateChecker(options.updateSource, this._eventBus) : null;
    }

    public get Paths(): PathManager {
        return this._paths;
    }

    public get Catalog(): ModCatalog {
        return this._catalog;
    }

    public get List(): LoadOrderList {
        return this._list;
    }

    /**
     * Rescans the mods root and rebuilds the load order from the persisted state.
     * A damaged state file is logged and treated as empty.
     * @throws IOError when the mods root cannot be listed
     */
    public async Refresh(): Promise<CatalogScanResult> {
        const scan = await scanCatalog(this._paths.ModsRoot());
        this._catalog = scan.mods;
        for (const warning of scan.warnings) {
            this._eventBus.Emit(EVENT_NAMES.catalogWarning, warning);
        }
        this._eventBus.Emit(EVENT_NAMES.catalogScanned, scan);

        this._list = fromCatalog(scan.mods, await this.__restoreState());
        this._settings = await loadOrCreateSettings(this._paths.LauncherSettingsFile(), DEFAULT_LAUNCHER_SETTINGS);
        this._eventBus.Emit(EVENT_NAMES.loadOrderChanged, toView(this._list));
        return scan;
    }

    /**
     * Persisted load order, or none when the state file is damaged; the next change rewrites it.
     * @private
     */
    private async __restoreState(): Promise<LoadOrderState | null> {
        const file = this._paths.LoadOrderFile();
        try {
            return await restore(file);
        } catch (err) {
            if (!(err instanceof ParseError) && !(err instanceof ValidationError)) {
                throw err;
            }
            log.warning(`Ignoring unreadable load-order state: ${err.message}`, `Launcher`, file);
            return null;
        }
    }

    /** Rows for rendering. */
    public View(): LoadOrderView[] {
        return toView(this._list);
    }

    private async __commit(list: LoadOrderList): Promise<LoadOrderView[]> {
        await persist(list, this._paths.LoadOrderFile());
        this._list = list;
        const view = toView(list);
        this._eventBus.Emit(EVENT_NAMES.loadOrderChanged, view);
        return view;
    }

    /** @throws NotFoundError when id is not installed */
    public async Enable(id: string, enabled: boolean): Promise<LoadOrderView[]> {
        return this.__commit(setEnabled(this._list, id, enabled));
    }

    /** @throws NotFoundError when id is not installed */
    public async Move(id: string, position: number): Promise<LoadOrderView[]> {
        return this.__commit(moveTo(this._list, id, position));
    }

    /** Orders enabled mods after the mods they depend on. */
    public async AutoSort(): Promise<LoadOrderView[]> {
        return this.__commit(sortByDependencies(this._list));
    }

    public async SavePreset(name: string): Promise<Preset> {
        return this._presets.Save(name, this._list);
    }

    public async ApplyPreset(name: string): Promise<LoadOrderView[]> {
        return this.__commit(await this._presets.Apply(name, this._list));
    }

    public async DeletePreset(name: string): Promise<void> {
        await this._presets.Delete(name);
    }

    public async Presets(): Promise<string[]> {
        return this._presets.List();
    }

    private __settings(): SettingsDocument {
        if (!this._settings) {
            throw new ConfigError(`Launcher settings are not loaded; refresh first`);
        }
        return this._settings;
    }

    /** Launcher settings in file order. */
    public Settings(): Array<{ key: string; value: SettingValue }> {
        return listSettings(this.__settings()).map(entry => {
            return { key: entry.qualifiedKey, value: entry.value };
        });
    }

    /**
     * Patches and writes one launcher setting. Turning `skipintro` on or off renames the movies
     * folder right away.
     * @throws InvalidKeyError for a key that is not an identifier
     */
    public async SetSetting(key: string, value: SettingValue): Promise<void> {
        const next = patchSetting(this.__settings(), key, value);
        await writeSettings(next);
        this._settings = next;
        if (key === LAUNCHER_KEYS.skipIntro) {
            await applySkipIntro(this._paths.GameRoot(), getBool(next, LAUNCHER_KEYS.skipIntro, false));
        }
    }

    /** Absolute user directory of the current enabled set. */
    public UserDir(): string {
        return this._paths.UserDir(resolveUserDir(this._list));
    }

    /**
     * Writes launcher choices into the game settings, rebuilds the merged event modifiers, and
     * starts the game. The load order is saved first.
     * @throws ConfigError / MergeConflictError when the game must not start
     * @example
     * const game = await launcher.Launch();
     * const { exitCode } = await game.exited;
     */
    public async Launch(): Promise<RunningGame> {
        const settings = this.__settings();
        const userDir = this.UserDir();

        await persist(this._list, this._paths.LoadOrderFile());
        const command = await this._builder.Build(settings, enabledInOrder(this._list), this._paths.GameRoot(), userDir);
        await syncGameSettings(this._paths.GameSettingsFile(resolveUserDir(this._list)), settings);
        await applySkipIntro(this._paths.GameRoot(), getBool(settings, LAUNCHER_KEYS.skipIntro, false));
        return this._runner.Start(command);
    }

    /** Deletes the map, gfx and music caches of the current user directory. */
    public async ClearCache(): Promise<string[]> {
        return clearCache(this.UserDir());
    }

    /** Save-game folder of the current user directory, created when missing. */
    public async SavesDir(): Promise<string> {
        return savesDir(this.UserDir());
    }

    /**
     * Starts background update checks over the catalog.
     * @throws ConfigError when no update source was given
     */
    public CheckUpdates(onReport?: UpdateCallback): Promise<void> {
        if (!this._updates) {
            throw new ConfigError(`No update source configured`);
        }
        return this._updates.CheckInBackground(this._catalog, onReport);
    }

    /** Saves the load order; call before the process exits. */
    public async Shutdown(): Promise<void> {
        await persist(this._list, this._paths.LoadOrderFile());
        log.debug(`Launcher state saved`, `Launcher`);
    }
}
