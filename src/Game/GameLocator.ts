/**
 * Finds the game installation when none is configured.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { PathExists } from '../Common/AtomicFile.js';

/** Install locations tried on each drive. */
export const DRIVE_INSTALL_DIRS = [
    [`Program Files (x86)`, `Steam`, `steamapps`, `common`, `Victoria 2`],
    [`GOG Games`, `Victoria II`],
] as const;

/**
 * Candidate game roots in the order they are tried: the launcher's own directory, its parent,
 * then the Steam and GOG defaults on every drive. Duplicates keep their first position.
 * @param appDir string - Directory the launcher runs from
 * @param drives string[] - Drive roots such as `C:\`
 * @example
 * defaultGameRootCandidates('D:\\Games\\V2\\launcher', ['C:\\']);
 */
export function defaultGameRootCandidates(appDir: string, drives: readonly string[] = []): string[] {
    const roots = [appDir, path.dirname(appDir)];
    for (const drive of drives) {
        for (const segments of DRIVE_INSTALL_DIRS) {
            roots.push(path.win32.join(drive, ...segments));
        }
    }
    return [...new Set(roots)];
}

/** True when dir holds the executable as a regular file. */
export async function hasExecutable(dir: string, executable: string): Promise<boolean> {
    try {
        const stat = await fs.stat(path.join(dir, executable));
        return stat.isFile();
    } catch {
        return false;
    }
}

/**
 * First candidate holding the executable.
 * @returns Promise<string | null> - null when none does
 */
export async function findGameRoot(candidates: readonly string[], executable: string): Promise<string | null> {
    for (const candidate of candidates) {
        if (candidate && (await hasExecutable(candidate, executable))) {
            return candidate;
        }
    }
    return null;
}

/** Drive roots present on Windows (`C:\\`...); empty elsewhere. */
export async function AvailableDrives(platform: NodeJS.Platform = process.platform): Promise<string[]> {
    if (platform !== `win32`) {
        return [];
    }
    const drives: string[] = [];
    for (let code = 65; code <= 90; code++) {
        const drive = `${String.fromCharCode(code)}:\\`;
        if (await PathExists(drive)) {
            drives.push(drive);
        }
    }
    return drives;
}
