/**
 * Typed read / patch / write of flat `key=value` settings files.
 * Patching is conservative: only the line of the patched key changes, every other byte of the
 * document is written back as it was read, comments and unknown keys included.
 */
import { promises as fs } from 'fs';
import type { SettingEntry, SettingsDocument, SettingValue } from '../Domain/Settings.js';
import { ErrorMessage, IOError, KeyNotFoundError, ParseError, SystemErrorCode } from '../Common/Errors.js';
import { WriteFileAtomic } from '../Common/AtomicFile.js';
import { log } from '../Common/Log.js';
import { SettingKey, ToSettingKey, type SettingKeyLike } from './SettingKey.js';
import {
    DetectEol,
    IndexSettings,
    LineBody,
    LineTerminator,
    SerializeSettingValue,
    SplitLines,
    type SettingsIndex,
} from './SettingsParser.js';

const _indexCache = new WeakMap<SettingsDocument, SettingsIndex>();

/** Lazily built, memoized per document value. */
function indexOf(doc: SettingsDocument): SettingsIndex {
    let index = _indexCache.get(doc);
    if (!index) {
        index = IndexSettings(doc);
        _indexCache.set(doc, index);
        for (const warning of index.warnings) {
            log.warning(`${warning.message}; line kept as is`, `SettingsStore`, doc.path);
        }
    }
    return index;
}

function findEntry(doc: SettingsDocument, key: SettingKey): SettingEntry | undefined {
    const { entries } = indexOf(doc);
    if (key.isNamespaced) {
        return entries.find(entry => {
            return entry.qualifiedKey === key.value;
        });
    }
    return entries.find(entry => {
        return entry.key === key.value;
    });
}

/**
 * Builds a document from text.
 * @param text string - File content (a leading BOM is kept and written back)
 * @param path string - Optional source path for messages
 */
export function parseSettings(text: string, path?: string): SettingsDocument {
    return { lines: SplitLines(text), path };
}

/** Text of a document, identical to what was parsed when nothing was patched. */
export function renderSettings(doc: SettingsDocument): string {
    return doc.lines.join(``);
}

/**
 * Reads a settings file.
 * @throws IOError when the file cannot be read, ParseError when it is not UTF-8
 * @example
 * const doc = await loadSettings('/home/me/Documents/Paradox Interactive/Victoria II/settings.txt');
 */
export async function loadSettings(path: string): Promise<SettingsDocument> {
    let data: Buffer;

    try {
        data = await fs.readFile(path);
    } catch (err) {
        const reason = SystemErrorCode(err) === `ENOENT` ? `does not exist` : ErrorMessage(err);
        throw new IOError(`Cannot read settings file ${path}: ${reason}`, path, err);
    }

    let text: string;
    try {
        text = new TextDecoder(`utf-8`, { fatal: true, ignoreBOM: true }).decode(data);
    } catch (err) {
        throw new ParseError(`Settings file ${path} is not valid UTF-8`, { path }, err);
    }
    return parseSettings(text, path);
}

/**
 * Reads a settings file, or writes `defaults` to it first when it is missing.
 */
export async function loadOrCreateSettings(path: string, defaults: string): Promise<SettingsDocument> {
    try {
        await fs.access(path);
    } catch {
        log.info(`Creating default settings file`, `SettingsStore`, path);
        await WriteFileAtomic(path, defaults);
    }
    return loadSettings(path);
}

/**
 * Writes a document through a temp file and rename.
 * @param doc SettingsDocument - Document to write
 * @param path string - Target; defaults to the path the document was loaded from
 * @throws IOError when no target is known or the write fails
 */
export async function writeSettings(doc: SettingsDocument, path: string | undefined = doc.path): Promise<void> {
    if (!path) {
        throw new IOError(`Settings document has no path to write to`, ``);
    }
    await WriteFileAtomic(path, renderSettings(doc));
}

/** True when the document holds a line for key. */
export function hasSetting(doc: SettingsDocument, key: SettingKeyLike): boolean {
    return findEntry(doc, ToSettingKey(key)) !== undefined;
}

/**
 * Normalized value of key.
 * @throws KeyNotFoundError when the document has no line for key
 * @throws InvalidKeyError when key is not an identifier
 */
export function getSetting(doc: SettingsDocument, key: SettingKeyLike): SettingValue {
    const settingKey = ToSettingKey(key);
    const entry = findEntry(doc, settingKey);
    if (!entry) {
        throw new KeyNotFoundError(settingKey.value, doc.path);
    }
    return entry.value;
}

/** Value of key, or fallback when absent. */
export function getSettingOr(doc: SettingsDocument, key: SettingKeyLike, fallback: SettingValue): SettingValue {
    const entry = findEntry(doc, ToSettingKey(key));
    return entry ? entry.value : fallback;
}

/**
 * Reads a flag that may be stored as a boolean word, an integer or a quoted digit.
 * @returns true/false for recognized spellings, undefined otherwise
 * @example
 * ReadFlag(1); // true
 * ReadFlag('1'); // true
 * ReadFlag('maybe'); // undefined
 */
export function ReadFlag(value: SettingValue | undefined): boolean | undefined {
    if (typeof value === `boolean`) {
        return value;
    }
    if (typeof value === `number`) {
        return value === 1 ? true : value === 0 ? false : undefined;
    }
    if (typeof value === `string`) {
        const normalized = value.trim().toLowerCase();
        if ([`1`, `yes`, `true`].includes(normalized)) {
            return true;
        }
        if ([`0`, `no`, `false`].includes(normalized)) {
            return false;
        }
    }
    return undefined;
}

/**
 * Flag value of key, or fallback when the key is missing or holds an unrecognized value.
 */
export function getBool(doc: SettingsDocument, key: SettingKeyLike, fallback: boolean): boolean {
    const entry = findEntry(doc, ToSettingKey(key));
    return ReadFlag(entry?.value) ?? fallback;
}

/**
 * Numeric value of key. Decimal text such as `1.000000` is accepted.
 * @returns the number, or fallback when the key is missing or not numeric
 */
export function getNumber(doc: SettingsDocument, key: SettingKeyLike, fallback: number): number {
    const entry = findEntry(doc, ToSettingKey(key));
    if (!entry) {
        return fallback;
    }
    if (typeof entry.value === `number`) {
        return entry.value;
    }
    if (typeof entry.value === `string` && entry.value.trim() !== ``) {
        const parsed = Number(entry.value);
        if (Number.isFinite(parsed)) {
            return parsed;
        }
    }
    return fallback;
}

/** Integer value of key, or fallback when the key is missing or holds anything else. */
export function getInteger(doc: SettingsDocument, key: SettingKeyLike, fallback: number): number {
    const value = getNumber(doc, key, Number.NaN);
    return Number.isInteger(value) ? value : fallback;
}

/** String form of key's value, or fallback when absent. */
export function getString(doc: SettingsDocument, key: SettingKeyLike, fallback: string): string {
    const entry = findEntry(doc, ToSettingKey(key));
    if (!entry) {
        return fallback;
    }
    return typeof entry.value === `string` ? entry.value : entry.rawValue;
}

/** Every recognized entry, in file order. */
export function listSettings(doc: SettingsDocument): Array<Pick<SettingEntry, 'key' | 'qualifiedKey' | 'value'>> {
    return indexOf(doc).entries.map(entry => {
        return { key: entry.key, qualifiedKey: entry.qualifiedKey, value: entry.value };
    });
}

/** Lines for `a.b.leaf=value` nested under the given indentation. */
function nestedLines(segments: string[], rendered: string, indent: string, eol: string): string[] {
    const [head, ...rest] = segments;
    if (rest.length === 0) {
        return [`${indent}${head}=${rendered}${eol}`];
    }
    return [`${indent}${head}=${eol}`, `${indent}{${eol}`, ...nestedLines(rest, rendered, `${indent}\t`, eol), `${indent}}${eol}`];
}

/**
 * Returns a new document with key set to value.
 * Replaces the first line whose text after indentation starts with exactly `key=`; when none
 * matches, appends a line (inside the nearest existing section for namespaced keys).
 * The input document is not modified.
 * @throws InvalidKeyError when key is not an identifier
 * @example
 * const next = patchSetting(doc, 'x', 1600);
 */
export function patchSetting(doc: SettingsDocument, key: SettingKeyLike, value: SettingValue): SettingsDocument {
    const settingKey = ToSettingKey(key);
    const entry = findEntry(doc, settingKey);
    const lines = [...doc.lines];

    if (entry) {
        const line = lines[entry.lineIndex];
        const bom = entry.lineIndex === 0 && line.startsWith(`\uFEFF`) ? `\uFEFF` : ``;
        lines[entry.lineIndex] = `${bom}${entry.indent}${entry.key}=${SerializeSettingValue(value, entry)}${LineTerminator(line)}`;
        return { lines, path: doc.path };
    }

    const eol = DetectEol(lines);
    const rendered = SerializeSettingValue(value);
    const segments = settingKey.segments;

    if (settingKey.isNamespaced) {
        const { sections } = indexOf(doc);
        for (let depth = segments.length - 1; depth > 0; depth--) {
            const name = segments.slice(0, depth).join(`.`);
            const section = sections.find(candidate => {
                return candidate.qualifiedName === name && candidate.closeLine >= 0;
            });
            if (section) {
                lines.splice(section.closeLine, 0, ...nestedLines(segments.slice(depth), rendered, `${section.indent}\t`, eol));
                return { lines, path: doc.path };
            }
        }
    }

    const last = lines.length - 1;
    if (last >= 0 && LineTerminator(lines[last]) === ``) {
        lines[last] = `${LineBody(lines[last])}${eol}`;
    }
    lines.push(...nestedLines(segments, rendered, ``, eol));
    return { lines, path: doc.path };
}

/** Applies several patches in insertion order. */
export function patchSettings(doc: SettingsDocument, values: Record<string, SettingValue>): SettingsDocument {
    return Object.entries(values).reduce((current, [key, value]) => {
        return patchSetting(current, key, value);
    }, doc);
}
