/**
 * Mod model as discovered by a catalog scan.
 * Values are immutable; a rescan replaces the whole catalog.
 */

/** Relative path of the event-modifier fragment inside a mod folder. */
export const EVENT_MODIFIERS_FRAGMENT = `common/event_modifiers.txt`;

/** Fragment kinds a mod may declare. */
export type FragmentKind = `eventModifiers`;

export interface Mod {
    /** Stable identity: the mod's folder name under the mods root. */
    readonly id: string;
    /** Display name from the descriptor `name` field. */
    readonly name: string;
    /** Absolute path of the mod folder. */
    readonly path: string;
    /** Descriptor file name relative to the mods root, e.g. `PDM.mod` or `PDM/descriptor.mod`. */
    readonly descriptorFile: string;
    /** Fragment files present in this mod, keyed by kind (absolute paths). */
    readonly fragments: Readonly<Partial<Record<FragmentKind, string>>>;
    /** Display names of mods this one should load after. */
    readonly dependencies: readonly string[];
    /** Per-mod user directory under the game's user data root, empty when not declared. */
    readonly userDir: string;
    readonly version?: string;
    /** Where the Updater collaborator looks for new releases. */
    readonly remoteUrl?: string;
}

/** A mod catalog: every mod discovered in one scan, sorted by id. */
export type ModCatalog = readonly Mod[];

/** Non-fatal scan finding. */
export interface CatalogWarning {
    /** Folder or descriptor the warning is about. */
    path: string;
    message: string;
}

export interface CatalogScanResult {
    mods: ModCatalog;
    warnings: CatalogWarning[];
}

/** Folder and descriptor name of the launcher-owned mod that carries merged fragments. */
export const OVERRIDE_MOD_ID = `z_launcher`;
