/**
 * Reader for `.mod` descriptor files:
 *
 *     name = "Pop Demand Mod"
 *     path = "mod/PDM"
 *     user_dir = "PDM"
 *     dependencies = { "HPM" "Graphics Pack" }
 *
 * `#` and `//` start comment lines. Values may be quoted. A `{` value runs until its braces close.
 */
import { ParseError } from '../Common/Errors.js';

export interface ModDescriptor {
    name: string;
    /** `path` as written, e.g. `mod/PDM`. */
    path?: string;
    userDir: string;
    dependencies: string[];
    version?: string;
    remoteUrl?: string;
}

function unquote(value: string): string {
    if (value.length >= 2 && value.startsWith(`"`) && value.endsWith(`"`)) {
        return value.slice(1, -1);
    }
    return value;
}

/** Items of a `{ "A" "B" }` or `{ A, B }` list. */
export function ParseDescriptorList(value: string): string[] {
    const inner = value.trim().replace(/^\{/, ``).replace(/\}$/, ``);
    const quoted = [...inner.matchAll(/"([^"]*)"/g)].map(match => {
        return match[1].trim();
    });
    if (quoted.length > 0) {
        return quoted.filter(Boolean);
    }
    return inner
        .split(/[\s,]+/)
        .map(item => {
            return item.trim();
        })
        .filter(Boolean);
}

/** Raw key/value pairs in file order; brace values are joined across lines. */
export function ReadDescriptorPairs(text: string): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        if (!line || line.startsWith(`#`) || line.startsWith(`//`) || !line.includes(`=`)) {
            continue;
        }
        const eq = line.indexOf(`=`);
        const key = line.slice(0, eq).trim();
        let value = line.slice(eq + 1).trim();

        let depth = (value.match(/\{/g)?.length ?? 0) - (value.match(/\}/g)?.length ?? 0);
        while (depth > 0 && i + 1 < lines.length) {
            i++;
            value += ` ${lines[i].trim()}`;
            depth += (lines[i].match(/\{/g)?.length ?? 0) - (lines[i].match(/\}/g)?.length ?? 0);
        }
        pairs.push([key, value.trim()]);
    }
    return pairs;
}

/**
 * Parses a descriptor.
 * @param text string - Descriptor content
 * @param file string - File name, for messages
 * @throws ParseError when the descriptor has no `name`
 * @example
 * ParseDescriptor('name = "HPM"\npath = "mod/HPM"', 'HPM.mod').name; // 'HPM'
 */
export function ParseDescriptor(text: string, file: string): ModDescriptor {
    const descriptor: Partial<ModDescriptor> & { dependencies: string[]; userDir: string } = {
        dependencies: [],
        userDir: ``,
    };

    for (const [key, value] of ReadDescriptorPairs(text)) {
        switch (key) {
            case `name`:
                descriptor.name = unquote(value);
                break;
            case `path`:
                descriptor.path = unquote(value);
                break;
            case `user_dir`:
                descriptor.userDir = unquote(value);
                break;
            case `dependencies`:
                descriptor.dependencies = ParseDescriptorList(value);
                break;
            case `version`:
                descriptor.version = unquote(value) || undefined;
                break;
            case `github`:
            case `remote_url`:
                descriptor.remoteUrl = unquote(value) || undefined;
                break;
        }
    }

    const name = descriptor.name?.trim();
    if (!name) {
        throw new ParseError(`Descriptor ${file} has no name`, { file });
    }
    return { ...descriptor, name };
}

/** Folder a descriptor `path` points at: the last path segment. */
export function DescriptorFolder(descriptorPath: string): string {
    const segments = descriptorPath.split(/[\\/]+/).filter(Boolean);
    return segments[segments.length - 1] ?? ``;
}
