import type { LogThreshold } from '../Common/Log.js';

/**
 * Validated configuration shape used across services. Every path is absolute.
 */
export interface ValidatedConfig {
    /** Game installation directory (holds the executable and `mod/`). */
    gameRoot: string;
    /** Executable file name inside gameRoot. */
    executable: string;
    /** Mods root scanned for descriptors. */
    modsDir: string;
    /** Per-user data root; mod user directories live beneath it. */
    userDataRoot: string;
    /** Launcher-owned state: launcher settings, load order, presets. */
    stateDir: string;
    logLevel: LogThreshold;
}
