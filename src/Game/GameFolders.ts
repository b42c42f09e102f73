/**
 * Housekeeping on the game's installation and user directories.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { ErrorMessage, IOError } from '../Common/Errors.js';
import { PathExists } from '../Common/AtomicFile.js';
import { log } from '../Common/Log.js';

/** Cache folders the game rebuilds on its next start. */
export const CACHE_FOLDERS = [`map`, `gfx`, `music`] as const;

export const SAVES_FOLDER = `save games`;

/**
 * Turns the intro movies off (`movies` -> `moviesdisabled`) or back on.
 * Nothing happens when the source folder is absent or the target already exists.
 * @returns Promise<boolean> - true when a folder was renamed
 * @throws IOError when the rename fails
 */
export async function applySkipIntro(gameRoot: string, skip: boolean): Promise<boolean> {
    const enabled = path.join(gameRoot, `movies`);
    const disabled = path.join(gameRoot, `moviesdisabled`);
    const [from, to] = skip ? [enabled, disabled] : [disabled, enabled];

    if (!(await PathExists(from)) || (await PathExists(to))) {
        return false;
    }
    try {
        await fs.rename(from, to);
    } catch (err) {
        throw new IOError(`Cannot rename ${from} to ${to}: ${ErrorMessage(err)}`, from, err);
    }
    log.info(skip ? `Intro movies disabled` : `Intro movies enabled`, `GameFolders`, gameRoot);
    return true;
}

/**
 * Deletes the cache folders of a user directory.
 * @returns Promise<string[]> - Folders that existed and were removed
 * @throws IOError when a folder cannot be removed
 */
export async function clearCache(userDir: string): Promise<string[]> {
    const removed: string[] = [];
    for (const name of CACHE_FOLDERS) {
        const target = path.join(userDir, name);
        if (!(await PathExists(target))) {
            continue;
        }
        try {
            await fs.rm(target, { recursive: true, force: true });
        } catch (err) {
            throw new IOError(`Cannot remove cache folder ${target}: ${ErrorMessage(err)}`, target, err);
        }
        removed.push(name);
    }
    log.info(`Cleared ${removed.length} cache folder(s)`, `GameFolders`, userDir);
    return removed;
}

/**
 * Save-game folder of a user directory, created when missing.
 * @throws IOError when it cannot be created
 */
export async function savesDir(userDir: string): Promise<string> {
    const target = path.join(userDir, SAVES_FOLDER);
    try {
        await fs.mkdir(target, { recursive: true });
    } catch (err) {
        throw new IOError(`Cannot create ${target}: ${ErrorMessage(err)}`, target, err);
    }
    return target;
}
