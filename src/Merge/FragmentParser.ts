/**
 * Parser for event-modifier fragments:
 *
 *     # comment
 *     war_exhaustion_malus = {
 *         war_exhaustion = 0.1
 *         icon = 4
 *     }
 *     simple_block = 3
 *
 * Each top-level `id = value` is one block. A value holding `{` continues over the following
 * lines until its braces balance; `id =` followed by a line starting with `{` is the same block.
 */

export interface FragmentBlock {
    id: string;
    /** Value text; multi-line values keep their inner lines as written. */
    value: string;
    /** 1-based line of the block's `id =`. */
    line: number;
}

/** Raised for text that is not a sequence of blocks; carries the 1-based line. */
export class FragmentSyntaxError extends Error {
    public readonly line: number;

    constructor(message: string, line: number) {
        super(message);
        this.name = `FragmentSyntaxError`;
        this.line = line;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Net brace depth change of a line, ignoring quoted text and `#` comments. */
export function BraceDelta(line: string): number {
    let delta = 0;
    let quoted = false;

    for (const ch of line) {
        if (ch === `"`) {
            quoted = !quoted;
        } else if (!quoted) {
            if (ch === `#`) {
                break;
            }
            if (ch === `{`) {
                delta++;
            } else if (ch === `}`) {
                delta--;
            }
        }
    }
    return delta;
}

function isSkippable(trimmed: string): boolean {
    return trimmed === `` || trimmed.startsWith(`#`);
}

/**
 * Splits fragment text into blocks in file order.
 * @throws FragmentSyntaxError for a line that is neither blank, comment nor `id = value`,
 * an empty id, a stray `}` or a block whose braces never close
 * @example
 * ParseFragment('a = 1\nb = { x = 2 }').map(b => b.id); // ['a', 'b']
 */
export function ParseFragment(text: string): FragmentBlock[] {
    const lines = text.replace(/^\uFEFF/, ``).split(/\r?\n/);
    const blocks: FragmentBlock[] = [];

    for (let i = 0; i < lines.length; i++) {
        const trimmed = lines[i].trim();
        if (isSkippable(trimmed)) {
            continue;
        }
        const lineNumber = i + 1;
        const eq = trimmed.indexOf(`=`);
        if (eq < 0) {
            throw new FragmentSyntaxError(`Expected 'id = value' but found '${trimmed}'`, lineNumber);
        }
        const id = trimmed.slice(0, eq).trim();
        if (!id) {
            throw new FragmentSyntaxError(`Block has an empty identifier`, lineNumber);
        }
        if (/[{}\s]/.test(id)) {
            throw new FragmentSyntaxError(`Invalid block identifier '${id}'`, lineNumber);
        }

        let value = trimmed.slice(eq + 1).trim();
        if (value === ``) {
            // `id =` with the opening brace on a later line
            let next = i + 1;
            while (next < lines.length && lines[next].trim() === ``) {
                next++;
            }
            if (next >= lines.length || !lines[next].trim().startsWith(`{`)) {
                throw new FragmentSyntaxError(`Block '${id}' has no value`, lineNumber);
            }
            i = next;
            value = lines[next].trim();
        }

        let depth = BraceDelta(value);
        if (depth < 0) {
            throw new FragmentSyntaxError(`Unexpected '}' in block '${id}'`, i + 1);
        }
        while (depth > 0) {
            i++;
            if (i >= lines.length) {
                throw new FragmentSyntaxError(`Block '${id}' is never closed`, lineNumber);
            }
            value += `\n${lines[i].trimEnd()}`;
            depth += BraceDelta(lines[i]);
            if (depth < 0) {
                throw new FragmentSyntaxError(`Unexpected '}' in block '${id}'`, i + 1);
            }
        }
        blocks.push({ id, value: value.trimEnd(), line: lineNumber });
    }
    return blocks;
}
