/**
 * Settings document model: raw lines plus a lazily derived key index.
 */

/** Closed set of semantic value types a setting normalizes to. */
export type SettingValue = boolean | number | string;

export interface SettingsDocument {
    /** Every line with its own terminator, so joining them reproduces the file. */
    readonly lines: readonly string[];
    /** Source path, for error messages. */
    readonly path?: string;
}

/** One recognized `key=value` line. */
export interface SettingEntry {
    /** Key as written (leading indentation removed). */
    key: string;
    /** Dot-joined enclosing section names plus the key, e.g. `graphics.size.x`. */
    qualifiedKey: string;
    lineIndex: number;
    /** Leading whitespace kept on rewrite. */
    indent: string;
    /** Value text after `=`, trimmed, quotes kept. */
    rawValue: string;
    value: SettingValue;
    quoted: boolean;
}

/** Span of a `name={ ... }` block. */
export interface SettingSection {
    qualifiedName: string;
    /** Line holding the opening brace. */
    openLine: number;
    /** Line holding the matching closing brace, -1 when the file ends first. */
    closeLine: number;
    /** Indentation of the section's key line. */
    indent: string;
}
