import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { ValidatedConfig } from '../Types/Config.js';
import { EVENT_MODIFIERS_FRAGMENT, OVERRIDE_MOD_ID } from '../Domain/Mod.js';

/**
 * PathManager centralizes resolution of filesystem paths used by the launcher (state files,
 * merged artifact, user directories). It derives them from validated configuration, creating
 * launcher-owned directories on demand (idempotent).
 */
export class PathManager {
    private _cfg: ValidatedConfig; // active configuration
    private _ensured: Set<string> = new Set(); // memo of created directories

    constructor(cfg: ValidatedConfig) {
        this._cfg = cfg;
    }

    /** Ensure directory exists (mkdir -p semantics). */
    private __ensure(dir: string): string {
        if (!this._ensured.has(dir)) {
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
            }
            this._ensured.add(dir);
        }
        return dir;
    }

    public GameRoot(): string {
        return this._cfg.gameRoot;
    }
    /** Absolute path of the game executable. */
    public Executable(): string {
        return join(this._cfg.gameRoot, this._cfg.executable);
    }
    /** Directory scanned for mods; never created here. */
    public ModsRoot(): string {
        return this._cfg.modsDir;
    }
    /** Root for launcher state. */
    public StateDir(): string {
        return this.__ensure(this._cfg.stateDir);
    }
    public LauncherSettingsFile(): string {
        return join(this.StateDir(), `launcher_settings.txt`);
    }
    public LoadOrderFile(): string {
        return join(this.StateDir(), `load_order.json`);
    }
    public PresetsFile(): string {
        return join(this.StateDir(), `presets.json`);
    }
    /** Folder of the launcher-owned override mod. */
    public OverrideModDir(): string {
        return join(this._cfg.modsDir, OVERRIDE_MOD_ID);
    }
    /** Merged event-modifier artifact inside the override mod. */
    public MergedArtifact(): string {
        return join(this.OverrideModDir(), ...EVENT_MODIFIERS_FRAGMENT.split(`/`));
    }
    public UserDataRoot(): string {
        return this._cfg.userDataRoot;
    }
    /** Directory the game uses for a mod's `user_dir`; the data root itself when empty. Not created. */
    public UserDir(userDir: string): string {
        return userDir ? join(this._cfg.userDataRoot, userDir) : this._cfg.userDataRoot;
    }
    /** Game's own settings.txt for a user directory. */
    public GameSettingsFile(userDir: string): string {
        return join(this.UserDir(userDir), `settings.txt`);
    }
}
