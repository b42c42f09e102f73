/**
 * Durable load-order state: enabled ids and positions, one JSON file.
 */
import Joi from 'joi';
import type { LoadOrderList, LoadOrderState } from '../Domain/LoadOrder.js';
import { ReadFileIfExists, WriteFileAtomic } from '../Common/AtomicFile.js';
import { ParseError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { toState } from './LoadOrderList.js';

const stateSchema = Joi.object<LoadOrderState>({
    version: Joi.number().valid(1).required(),
    entries: Joi.array()
        .items(
            Joi.object({
                id: Joi.string().min(1).required(),
                enabled: Joi.boolean().required(),
                position: Joi.number().integer().min(0).required(),
                loadIndex: Joi.number().integer().min(0).allow(null),
            }),
        )
        .required(),
});

/** Older state files held only the enabled ids, in order. */
const legacySchema = Joi.object<{ checked_mods: string[] }>({
    checked_mods: Joi.array().items(Joi.string()).required(),
}).unknown(true);

/**
 * Validates parsed JSON as load-order state.
 * @throws ValidationError when the document matches neither the current nor the legacy layout
 */
export function ParseLoadOrderState(raw: unknown, source: string): LoadOrderState {
    const current = stateSchema.validate(raw);
    if (!current.error) {
        return current.value;
    }
    const legacy = legacySchema.validate(raw);
    if (!legacy.error) {
        log.info(`Reading legacy checked_mods state`, `LoadOrderStore`, source);
        return {
            version: 1,
            entries: legacy.value.checked_mods.map((id, position) => {
                return { id, enabled: true, position, loadIndex: position };
            }),
        };
    }
    throw new ValidationError(`Invalid load-order state in ${source}: ${current.error.message}`, { path: source });
}

/**
 * Writes a list's durable state.
 * @throws IOError when the file cannot be written
 */
export async function persist(list: LoadOrderList, path: string): Promise<void> {
    await WriteFileAtomic(path, `${JSON.stringify(toState(list), null, 4)}\n`);
    log.debug(`Saved load order (${list.entries.length} entries)`, `LoadOrderStore`, path);
}

/**
 * Reads persisted state; a missing file yields an empty state.
 * @throws IOError when the file exists but cannot be read, ParseError / ValidationError on bad content
 * @example
 * const list = fromCatalog(catalog, await restore(statePath));
 */
export async function restore(path: string): Promise<LoadOrderState> {
    const data = await ReadFileIfExists(path);
    if (!data) {
        return { version: 1, entries: [] };
    }
    let raw: unknown;
    try {
        raw = JSON.parse(data.toString(`utf-8`));
    } catch (err) {
        throw new ParseError(`Load-order state ${path} is not valid JSON`, { path }, err);
    }
    return ParseLoadOrderState(raw, path);
}
