/**
 * Launch command model. Derived on every start, never persisted.
 */

/** OS-level priority hint passed to the process runner. */
export type PriorityClass = `normal` | `high` | `realtime`;

export interface LaunchCommand {
    /** Absolute path of the game executable. */
    executable: string;
    workingDirectory: string;
    args: string[];
    priority: PriorityClass;
}

export interface LaunchResult {
    pid?: number;
    exitCode: number | null;
    stdout: string;
    stderr: string;
}

/** Version comparison reported by the Updater collaborator. */
export interface UpdateReport {
    modId: string;
    currentVersion: string | null;
    remoteVersion: string | null;
    downloadUrl: string | null;
    updateAvailable: boolean;
}
