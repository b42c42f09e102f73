/**
 * Line-level parsing for flat `key=value` settings files.
 * Nothing here rewrites text: the index only points into the document's lines.
 */
import type { SettingEntry, SettingSection, SettingsDocument, SettingValue } from '../Domain/Settings.js';
import { ValidationError } from '../Common/Errors.js';

export interface SettingsIndex {
    entries: SettingEntry[];
    sections: SettingSection[];
    /** Lines treated as opaque because their braces do not balance. */
    warnings: Array<{ lineIndex: number; message: string }>;
}

/**
 * Splits text into lines that keep their terminators.
 * @example
 * SplitLines('a=1\r\nb=2'); // ['a=1\r\n', 'b=2']
 */
export function SplitLines(text: string): string[] {
    const lines: string[] = [];
    let start = 0;

    for (let i = 0; i < text.length; i++) {
        if (text[i] === `\n`) {
            lines.push(text.slice(start, i + 1));
            start = i + 1;
        }
    }
    if (start < text.length) {
        lines.push(text.slice(start));
    }
    return lines;
}

/** Line text without its terminator. */
export function LineBody(line: string): string {
    return line.replace(/\r?\n$/, ``);
}

/** Terminator of a line (`\n`, `\r\n` or empty for the last line). */
export function LineTerminator(line: string): string {
    return line.slice(LineBody(line).length);
}

/** Terminator used by the first terminated line, `\n` by default. */
export function DetectEol(lines: readonly string[]): string {
    for (const line of lines) {
        const eol = LineTerminator(line);
        if (eol) {
            return eol;
        }
    }
    return `\n`;
}

/**
 * Normalizes a raw value into bool, integer or string.
 * Quoted text is always a string, quotes removed.
 */
export function ParseSettingValue(raw: string): { value: SettingValue; quoted: boolean } {
    if (raw.length >= 2 && raw.startsWith(`"`) && raw.endsWith(`"`)) {
        return { value: raw.slice(1, -1), quoted: true };
    }
    if (raw === `yes` || raw === `true`) {
        return { value: true, quoted: false };
    }
    if (raw === `no` || raw === `false`) {
        return { value: false, quoted: false };
    }
    if (/^-?\d+$/.test(raw)) {
        const parsed = Number(raw);
        if (Number.isSafeInteger(parsed)) {
            return { value: parsed, quoted: false };
        }
    }
    return { value: raw, quoted: false };
}

/**
 * Renders a value for a settings line, keeping the style of the line it replaces.
 * Strings that would read back as another value, or that hold braces, are quoted.
 * @throws ValidationError when the value would break the line structure
 */
export function SerializeSettingValue(value: SettingValue, previous?: SettingEntry): string {
    if (typeof value === `boolean`) {
        const wordy = previous?.rawValue === `true` || previous?.rawValue === `false`;
        if (wordy) {
            return value ? `true` : `false`;
        }
        return value ? `yes` : `no`;
    }
    if (typeof value === `number`) {
        if (!Number.isFinite(value)) {
            throw new ValidationError(`Setting value must be a finite number`, { value });
        }
        return String(value);
    }
    if (/[\r\n]/.test(value)) {
        throw new ValidationError(`Setting value must be a single line`, { value });
    }
    const hasBraces = /[{}]/.test(value);
    if (hasBraces && value.includes(`"`)) {
        throw new ValidationError(`Setting value must not mix quotes and braces`, { value });
    }
    const readsBack = value !== `` && value.trim() === value && ParseSettingValue(value).value === value;
    if (previous?.quoted || hasBraces || !readsBack) {
        return `"${value}"`;
    }
    return value;
}

/** Braces outside double quotes, in order. */
function braceChars(text: string): Array<`{` | `}`> {
    const out: Array<`{` | `}`> = [];
    let quoted = false;

    for (const ch of text) {
        if (ch === `"`) {
            quoted = !quoted;
        } else if (!quoted && (ch === `{` || ch === `}`)) {
            out.push(ch);
        }
    }
    return out;
}

/**
 * Builds the key and section index of a document.
 * A line is an entry when it has `=` and the text before it holds no brace; everything else is opaque.
 */
export function IndexSettings(doc: SettingsDocument): SettingsIndex {
    const entries: SettingEntry[] = [];
    const sections: SettingSection[] = [];
    const warnings: SettingsIndex['warnings'] = [];
    const stack: Array<{ name: string; section: SettingSection }> = [];
    let pending: { name: string; indent: string } | null = null;

    doc.lines.forEach((line, lineIndex) => {
        let body = LineBody(line);
        if (lineIndex === 0) {
            body = body.replace(/^\uFEFF/, ``);
        }
        const trimmed = body.trimStart();
        const indent = body.slice(0, body.length - trimmed.length);

        if (trimmed === `` || trimmed.startsWith(`#`)) {
            return;
        }

        let braceText = trimmed;
        const eq = trimmed.indexOf(`=`);
        const keyText = eq > 0 ? trimmed.slice(0, eq) : ``;

        if (keyText && !/[{}]/.test(keyText)) {
            const rawValue = trimmed.slice(eq + 1).trim();
            const { value, quoted } = ParseSettingValue(rawValue);
            entries.push({
                key: keyText,
                qualifiedKey: [...stack.map(s => s.name), keyText].join(`.`),
                lineIndex,
                indent,
                rawValue,
                value,
                quoted,
            });
            pending = rawValue === `` || rawValue.startsWith(`{`) ? { name: keyText, indent } : null;
            braceText = rawValue;
        } else if (!trimmed.startsWith(`{`)) {
            pending = null;
        }

        for (const brace of braceChars(braceText)) {
            if (brace === `{`) {
                const name: string = pending?.name ?? `#${lineIndex}`;
                const section: SettingSection = {
                    qualifiedName: [...stack.map(s => s.name), name].join(`.`),
                    openLine: lineIndex,
                    closeLine: -1,
                    indent: pending?.indent ?? indent,
                };
                sections.push(section);
                stack.push({ name, section });
                pending = null;
            } else {
                const top = stack.pop();
                if (top) {
                    top.section.closeLine = lineIndex;
                } else {
                    warnings.push({ lineIndex, message: `Unmatched '}' on line ${lineIndex + 1}` });
                }
            }
        }
    });

    for (const open of stack) {
        warnings.push({
            lineIndex: open.section.openLine,
            message: `Section '${open.section.qualifiedName}' opened on line ${open.section.openLine + 1} is never closed`,
        });
    }
    return { entries, sections, warnings };
}
