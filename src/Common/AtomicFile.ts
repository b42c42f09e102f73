/**
 * File helpers shared by every component that rewrites a file the game or the launcher reads back.
 * A write lands in a sibling temp file first and is renamed over the target, so a crash leaves
 * either the old or the new content on disk.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { ErrorMessage, IOError, SystemErrorCode } from './Errors.js';

/**
 * Writes data to filePath through a temp file and rename.
 * @param filePath string - Target file (parent directories are created)
 * @param data string | Buffer - Full new content
 * @returns Promise<void>
 * @throws IOError when the directory, temp file or rename fails
 * @example
 * await WriteFileAtomic('/games/v2/mod/z_launcher/common/event_modifiers.txt', merged);
 */
export async function WriteFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
    const dir = path.dirname(filePath);
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);

    try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(tempPath, data);
        await fs.rename(tempPath, filePath);
    } catch (err) {
        await fs.rm(tempPath, { force: true });
        throw new IOError(`Failed to write ${filePath}: ${ErrorMessage(err)}`, filePath, err);
    }
}

/**
 * Reads a file as a Buffer, or null when it does not exist.
 * @throws IOError for any failure other than a missing file
 */
export async function ReadFileIfExists(filePath: string): Promise<Buffer | null> {
    try {
        return await fs.readFile(filePath);
    } catch (err) {
        if (SystemErrorCode(err) === `ENOENT`) {
            return null;
        }
        throw new IOError(`Failed to read ${filePath}: ${ErrorMessage(err)}`, filePath, err);
    }
}

/** True when filePath exists (file or directory). */
export async function PathExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}
