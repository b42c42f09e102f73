/**
 * Named load-order snapshots. Only enabled ids and their order are kept.
 */
export interface Preset {
    name: string;
    /** Enabled mod ids in load order. */
    enabled: string[];
    /** ISO timestamp of the last save. */
    savedAt: string;
}

export interface PresetFile {
    version: 1;
    presets: Record<string, Omit<Preset, 'name'>>;
}
