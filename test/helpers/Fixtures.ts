import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Mod } from '../../src/Domain/Mod.js';

/** Fresh directory under the OS temp dir. */
export async function MakeTempDir(prefix = 'launcher-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function RemoveDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/** Writes files given as relative path -> content, creating parent folders. */
export async function WriteTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [relative, content] of Object.entries(files)) {
        const target = path.join(root, ...relative.split('/'));
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content, 'utf-8');
    }
}

/** Mod value for list and merge tests. */
export function MakeMod(id: string, overrides: Partial<Mod> = {}): Mod {
    return {
        id,
        name: id,
        path: `/mods/${id}`,
        descriptorFile: `${id}.mod`,
        fragments: {},
        dependencies: [],
        userDir: '',
        ...overrides,
    };
}
