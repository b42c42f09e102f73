/**
 * Builds the merged event-modifier artifact from the enabled mods' fragments.
 *
 * Blocks are keyed by identifier. The first mod declaring an identifier fixes where the block
 * appears in the output; a later mod in load order declaring it with different content replaces
 * the content (last writer wins) and the replacement is logged and emitted as `merge.override`.
 * Each block in the output is preceded by a `# <modId>` line naming the mod it came from.
 */
import path from 'path';
import type { Mod } from '../Domain/Mod.js';
import { OVERRIDE_MOD_ID } from '../Domain/Mod.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { ErrorMessage, MergeConflictError } from '../Common/Errors.js';
import { PathExists, ReadFileIfExists, WriteFileAtomic } from '../Common/AtomicFile.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { FragmentSyntaxError, ParseFragment, type FragmentBlock } from './FragmentParser.js';

/** Fragment text of one mod. */
export interface FragmentSource {
    modId: string;
    file: string;
    text: string;
}

export interface MergedBlock {
    id: string;
    value: string;
    /** Mod whose content won. */
    source: string;
}

export interface BlockOverride {
    blockId: string;
    previous: string;
    next: string;
}

export interface MergeResult {
    blocks: MergedBlock[];
    overrides: BlockOverride[];
    /** Mods that contributed at least one block, in load order. */
    contributors: string[];
}

export interface MergeReport extends MergeResult {
    outputPath: string;
    /** Exact text written to outputPath. */
    content: string;
}

/** Content of the override mod's sibling descriptor. */
export const OVERRIDE_MOD_DESCRIPTOR = [
    `name = "${OVERRIDE_MOD_ID}"`,
    `path = "mod/${OVERRIDE_MOD_ID}"`,
    `user_dir = "${OVERRIDE_MOD_ID}"`,
    ``,
].join(`\n`);

const OVERRIDE_MOD_README = `This folder and mod hold the merged event modifiers of the enabled mods. It is rebuilt before every launch and hidden from the mod list.\n`;

/**
 * Merges parsed fragments in the given order. Pure.
 * @throws MergeConflictError when a fragment is malformed
 * @example
 * const { blocks } = MergeFragments([{ modId: 'a', file: 'a.txt', text: 'x = 1' }]);
 */
export function MergeFragments(sources: readonly FragmentSource[]): MergeResult {
    const order: string[] = [];
    const winners = new Map<string, MergedBlock>();
    const overrides: BlockOverride[] = [];
    const contributors: string[] = [];

    for (const source of sources) {
        let parsed: FragmentBlock[];
        try {
            parsed = ParseFragment(source.text);
        } catch (err) {
            if (err instanceof FragmentSyntaxError) {
                throw new MergeConflictError(
                    `Malformed event modifiers in mod '${source.modId}' (${source.file}, line ${err.line}): ${err.message}`,
                    source.modId,
                    source.file,
                    err.line,
                    err,
                );
            }
            throw err;
        }
        if (parsed.length > 0 && !contributors.includes(source.modId)) {
            contributors.push(source.modId);
        }

        for (const block of parsed) {
            const current = winners.get(block.id);
            if (!current) {
                order.push(block.id);
                winners.set(block.id, { id: block.id, value: block.value, source: source.modId });
                continue;
            }
            if (current.value === block.value) {
                continue;
            }
            overrides.push({ blockId: block.id, previous: current.source, next: source.modId });
            winners.set(block.id, { id: block.id, value: block.value, source: source.modId });
        }
    }

    const blocks: MergedBlock[] = [];
    for (const id of order) {
        const block = winners.get(id);
        if (block) {
            blocks.push(block);
        }
    }
    return { blocks, overrides, contributors };
}

/** Artifact text: a `# <modId>` line, then `id=value`, per block. */
export function RenderMerged(blocks: readonly MergedBlock[]): string {
    return blocks
        .map(block => {
            return `# ${block.source}\n${block.id}=${block.value}\n`;
        })
        .join(``);
}

/**
 * Reads the event-modifier fragment of each mod that declares one.
 * A fragment that vanished since the scan contributes nothing.
 * @throws MergeConflictError when a declared fragment exists but cannot be read or decoded
 */
export async function ReadFragments(orderedMods: readonly Mod[]): Promise<FragmentSource[]> {
    const sources: FragmentSource[] = [];

    for (const mod of orderedMods) {
        const file = mod.fragments.eventModifiers;
        if (!file) {
            continue;
        }
        let data: Buffer | null;
        try {
            data = await ReadFileIfExists(file);
        } catch (err) {
            throw new MergeConflictError(
                `Cannot read event modifiers of mod '${mod.id}': ${ErrorMessage(err)}`,
                mod.id,
                file,
                undefined,
                err,
            );
        }
        if (data === null) {
            log.debug(`Fragment no longer exists; nothing to merge`, `MergeEngine`, file);
            continue;
        }
        let text: string;
        try {
            text = new TextDecoder(`utf-8`, { fatal: true, ignoreBOM: true }).decode(data);
        } catch (err) {
            throw new MergeConflictError(
                `Event modifiers of mod '${mod.id}' are not valid UTF-8`,
                mod.id,
                file,
                undefined,
                err,
            );
        }
        sources.push({ modId: mod.id, file, text });
    }
    return sources;
}

/**
 * Creates the override mod (folder, sibling descriptor, readme) under modsRoot when missing.
 * Existing files are left untouched.
 */
export async function EnsureOverrideMod(modsRoot: string): Promise<void> {
    const descriptorPath = path.join(modsRoot, `${OVERRIDE_MOD_ID}.mod`);
    const readmePath = path.join(modsRoot, OVERRIDE_MOD_ID, `readme.txt`);

    if (!(await PathExists(descriptorPath))) {
        log.info(`Creating override mod descriptor`, `MergeEngine`, descriptorPath);
        await WriteFileAtomic(descriptorPath, OVERRIDE_MOD_DESCRIPTOR);
    }
    if (!(await PathExists(readmePath))) {
        await WriteFileAtomic(readmePath, OVERRIDE_MOD_README);
    }
}

/**
 * Reads, merges and writes event-modifier fragments, reporting every override.
 */
export class MergeEngine {
    private _eventBus: MainEventBus;

    /**
     * @param eventBus MainEventBus - Receives `merge.override` and `merge.completed`
     */
    constructor(eventBus: MainEventBus = MAIN_EVENT_BUS) {
        this._eventBus = eventBus;
    }

    /**
     * Merges the fragments of orderedMods (load order, first loaded first) into outputPath.
     * Nothing is written when a fragment cannot be read or parsed.
     * @returns Promise<MergeReport> - Blocks, overrides and the text written
     * @throws MergeConflictError naming the mod, file and line at fault
     * @throws IOError when the artifact cannot be written
     * @example
     * const report = await engine.Merge(enabledInOrder(list), paths.MergedArtifact());
     */
    public async Merge(orderedMods: readonly Mod[], outputPath: string): Promise<MergeReport> {
        const sources = await ReadFragments(orderedMods);
        const result = MergeFragments(sources);

        for (const override of result.overrides) {
            log.info(
                `Block '${override.blockId}' from mod '${override.previous}' overridden by mod '${override.next}'`,
                `MergeEngine`,
            );
            this._eventBus.Emit(EVENT_NAMES.mergeOverride, override);
        }

        const content = RenderMerged(result.blocks);
        await WriteFileAtomic(outputPath, content);

        log.info(
            `Merged ${result.blocks.length} block(s) from ${result.contributors.length} mod(s), ${result.overrides.length} override(s)`,
            `MergeEngine`,
            outputPath,
        );
        this._eventBus.Emit(EVENT_NAMES.mergeCompleted, {
            outputPath,
            blocks: result.blocks.length,
            overrides: result.overrides.length,
            contributors: result.contributors,
        });
        return { ...result, outputPath, content };
    }
}
