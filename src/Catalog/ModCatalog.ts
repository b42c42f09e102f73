/**
 * Discovers mods under the game's mods root.
 *
 * Each subdirectory with a recognized descriptor yields one Mod. A descriptor is either a sibling
 * `<modsRoot>/<any>.mod` whose `path` names the folder (the game's own convention) or a
 * `<folder>/descriptor.mod`. Folders without a descriptor and malformed descriptors are skipped
 * with one warning each.
 */
import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import type { CatalogScanResult, CatalogWarning, Mod } from '../Domain/Mod.js';
import { EVENT_MODIFIERS_FRAGMENT, OVERRIDE_MOD_ID } from '../Domain/Mod.js';
import { ErrorMessage, IOError, ParseError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { DescriptorFolder, ParseDescriptor, type ModDescriptor } from './DescriptorParser.js';

/** In-folder descriptor name used when no sibling `.mod` file points at the folder. */
export const FOLDER_DESCRIPTOR = `descriptor.mod`;

export interface ScanOptions {
    /** Folder names never listed. The launcher's override mod is always hidden. */
    hidden?: string[];
}

interface DescriptorCandidate {
    /** Relative to modsRoot, forward slashes. */
    file: string;
    descriptor?: ModDescriptor;
    error?: string;
}

async function readCandidate(modsRoot: string, relative: string): Promise<DescriptorCandidate> {
    try {
        const text = await fs.readFile(path.join(modsRoot, relative), `utf-8`);
        return { file: relative, descriptor: ParseDescriptor(text, relative) };
    } catch (err) {
        const reason = err instanceof ParseError ? err.message : `Cannot read descriptor ${relative}: ${ErrorMessage(err)}`;
        return { file: relative, error: reason };
    }
}

async function exists(target: string): Promise<boolean> {
    try {
        await fs.lstat(target);
        return true;
    } catch {
        return false;
    }
}

/**
 * Scans modsRoot.
 * @param modsRoot string - The game's `mod` directory
 * @returns Promise<CatalogScanResult> - Mods sorted by id, plus non-fatal warnings
 * @throws IOError when modsRoot itself cannot be listed
 * @example
 * const { mods, warnings } = await scanCatalog('/games/Victoria 2/mod');
 */
export async function scanCatalog(modsRoot: string, options: ScanOptions = {}): Promise<CatalogScanResult> {
    let dirents: Dirent[];
    try {
        dirents = await fs.readdir(modsRoot, { withFileTypes: true });
    } catch (err) {
        throw new IOError(`Cannot list mods directory ${modsRoot}: ${ErrorMessage(err)}`, modsRoot, err);
    }

    const hidden = new Set([OVERRIDE_MOD_ID, ...(options.hidden ?? [])]);
    const byName = (a: Dirent, b: Dirent): number => {
        return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    };
    const folders = dirents
        .filter(entry => {
            return entry.isDirectory() && !hidden.has(entry.name) && !entry.name.startsWith(`.`);
        })
        .sort(byName);
    const descriptorFiles = dirents
        .filter(entry => {
            return entry.isFile() && entry.name.toLowerCase().endsWith(`.mod`);
        })
        .sort(byName);

    // Sibling descriptors, keyed by the folder their `path` (or file name) points at.
    const siblings = new Map<string, DescriptorCandidate>();
    for (const entry of descriptorFiles) {
        const candidate = await readCandidate(modsRoot, entry.name);
        const folder = candidate.descriptor?.path
            ? DescriptorFolder(candidate.descriptor.path)
            : entry.name.slice(0, -`.mod`.length);
        if (siblings.has(folder)) {
            log.debug(`Ignoring ${entry.name}: ${siblings.get(folder)?.file} already describes ${folder}`, `ModCatalog`);
            continue;
        }
        siblings.set(folder, candidate);
    }

    const mods: Mod[] = [];
    const warnings: CatalogWarning[] = [];
    const warn = (target: string, message: string): void => {
        warnings.push({ path: target, message });
        log.warning(message, `ModCatalog`, target);
    };

    for (const folder of folders) {
        const folderPath = path.join(modsRoot, folder.name);
        let candidate = siblings.get(folder.name);

        if (!candidate && (await exists(path.join(folderPath, FOLDER_DESCRIPTOR)))) {
            candidate = await readCandidate(modsRoot, `${folder.name}/${FOLDER_DESCRIPTOR}`);
        }
        if (!candidate) {
            warn(folderPath, `Mod folder '${folder.name}' has no descriptor; skipped`);
            continue;
        }
        if (!candidate.descriptor) {
            warn(path.join(modsRoot, candidate.file), `${candidate.error ?? `Malformed descriptor ${candidate.file}`}; skipped`);
            continue;
        }

        const fragmentPath = path.join(folderPath, ...EVENT_MODIFIERS_FRAGMENT.split(`/`));
        const descriptor = candidate.descriptor;
        mods.push({
            id: folder.name,
            name: descriptor.name,
            path: folderPath,
            descriptorFile: candidate.file,
            fragments: (await exists(fragmentPath)) ? { eventModifiers: fragmentPath } : {},
            dependencies: descriptor.dependencies,
            userDir: descriptor.userDir,
            version: descriptor.version,
            remoteUrl: descriptor.remoteUrl,
        });
    }

    log.info(`Scanned ${mods.length} mod(s), ${warnings.length} warning(s)`, `ModCatalog`, modsRoot);
    return { mods, warnings };
}

/** Catalog lookup by id. */
export function IndexCatalog(mods: readonly Mod[]): Map<string, Mod> {
    return new Map(
        mods.map(mod => {
            return [mod.id, mod];
        }),
    );
}
