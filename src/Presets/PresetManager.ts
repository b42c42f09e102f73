/**
 * Named snapshots of the enabled mods and their order, kept in one JSON file.
 */
import Joi from 'joi';
import type { LoadOrderList } from '../Domain/LoadOrder.js';
import type { Preset, PresetFile } from '../Domain/Preset.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { NotFoundError, ParseError, ValidationError } from '../Common/Errors.js';
import { ReadFileIfExists, WriteFileAtomic } from '../Common/AtomicFile.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { enabledInOrder, withEnabledOrder } from '../LoadOrder/LoadOrderList.js';

const presetFileSchema = Joi.object<PresetFile>({
    version: Joi.number().valid(1).required(),
    presets: Joi.object()
        .pattern(
            Joi.string().min(1),
            Joi.object({
                enabled: Joi.array().items(Joi.string().min(1)).required(),
                savedAt: Joi.string().isoDate().required(),
            }),
        )
        .required(),
});

export interface PresetManagerOptions {
    eventBus?: MainEventBus;
    /** Clock for `savedAt`. */
    now?: () => Date;
}

/**
 * Saves, lists, applies and deletes presets. Every call reads the file afresh and every change
 * rewrites it atomically, so several launcher instances never see a partial file.
 */
export class PresetManager {
    private _filePath: string;
    private _eventBus: MainEventBus;
    private _now: () => Date;

    /**
     * @param filePath string - Preset store, e.g. `<stateDir>/presets.json`
     * @example
     * const presets = new PresetManager(paths.PresetsFile());
     */
    constructor(filePath: string, options: PresetManagerOptions = {}) {
        this._filePath = filePath;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this._now =
            options.now ??
            (() => {
                return new Date();
            });
    }

    private async __read(): Promise<PresetFile> {
        const data = await ReadFileIfExists(this._filePath);
        if (!data) {
            return { version: 1, presets: {} };
        }
        let raw: unknown;
        try {
            raw = JSON.parse(data.toString(`utf-8`));
        } catch (err) {
            throw new ParseError(`Preset store ${this._filePath} is not valid JSON`, { path: this._filePath }, err);
        }
        const { value, error } = presetFileSchema.validate(raw);
        if (error) {
            throw new ValidationError(`Invalid preset store ${this._filePath}: ${error.message}`, { path: this._filePath });
        }
        return value;
    }

    private async __write(file: PresetFile): Promise<void> {
        await WriteFileAtomic(this._filePath, `${JSON.stringify(file, null, 4)}\n`);
    }

    private static __checkName(name: string): string {
        const trimmed = name.trim();
        if (!trimmed) {
            throw new ValidationError(`Preset name must not be empty`, { name });
        }
        return trimmed;
    }

    /**
     * Stores the enabled mods of list, in load order, under name. An existing preset is replaced.
     * @throws ValidationError for an empty name, IOError when the store cannot be written
     */
    public async Save(name: string, list: LoadOrderList): Promise<Preset> {
        const presetName = PresetManager.__checkName(name);
        const file = await this.__read();
        const snapshot = {
            enabled: enabledInOrder(list).map(mod => {
                return mod.id;
            }),
            savedAt: this._now().toISOString(),
        };
        if (presetName in file.presets) {
            log.info(`Replacing preset '${presetName}'`, `PresetManager`);
        }
        file.presets[presetName] = snapshot;
        await this.__write(file);
        this._eventBus.Emit(EVENT_NAMES.presetSaved, { name: presetName });
        return { name: presetName, ...snapshot };
    }

    /** Preset names, alphabetical. */
    public async List(): Promise<string[]> {
        const file = await this.__read();
        return Object.keys(file.presets).sort();
    }

    /**
     * Stored snapshot.
     * @throws NotFoundError when no preset has that name
     */
    public async Get(name: string): Promise<Preset> {
        const file = await this.__read();
        const stored = Object.prototype.hasOwnProperty.call(file.presets, name) ? file.presets[name] : undefined;
        if (!stored) {
            throw new NotFoundError(`Preset '${name}' not found`, { preset: name });
        }
        return { name, enabled: [...stored.enabled], savedAt: stored.savedAt };
    }

    /**
     * Enables the preset's mods, in the preset's order, ahead of the others; everything else in
     * current is disabled. Mods no longer installed are dropped without error.
     * @param current LoadOrderList - List built from the current catalog
     * @throws NotFoundError when no preset has that name
     * @example
     * list = await presets.Apply('Multiplayer', list);
     */
    public async Apply(name: string, current: LoadOrderList): Promise<LoadOrderList> {
        const preset = await this.Get(name);
        const { list, missing } = withEnabledOrder(current, preset.enabled);
        if (missing.length > 0) {
            log.info(`Preset '${name}' references mods no longer installed: ${missing.join(`, `)}`, `PresetManager`);
        }
        this._eventBus.Emit(EVENT_NAMES.presetApplied, { name, dropped: missing });
        return list;
    }

    /**
     * @throws NotFoundError when no preset has that name
     */
    public async Delete(name: string): Promise<void> {
        const file = await this.__read();
        if (!Object.prototype.hasOwnProperty.call(file.presets, name)) {
            throw new NotFoundError(`Preset '${name}' not found`, { preset: name });
        }
        delete file.presets[name];
        await this.__write(file);
        this._eventBus.Emit(EVENT_NAMES.presetDeleted, { name });
    }
}
