/**
 * Compares installed mod versions with what an external update source reports.
 * Checks run in the background; launching and merging never wait for them.
 */
import type { UpdateReport } from '../Domain/Launch.js';
import type { Mod } from '../Domain/Mod.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { ErrorMessage } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';

/** What the update source knows about one mod. */
export interface RemoteRelease {
    version: string | null;
    downloadUrl: string | null;
}

/** External collaborator that looks up releases, e.g. from a release feed. */
export interface UpdateSource {
    Latest(mod: Mod): Promise<RemoteRelease>;
}

/** Compares dot-separated parts: numbers numerically, anything else as text after numbers. */
function compareParts(left: readonly string[], right: readonly string[], pad: boolean): number {
    for (let i = 0; i < Math.max(left.length, right.length); i++) {
        const l = left[i] ?? (pad ? `0` : undefined);
        const r = right[i] ?? (pad ? `0` : undefined);
        if (l === undefined || r === undefined) {
            return l === undefined ? -1 : 1;
        }
        const lNumeric = /^\d+$/.test(l);
        const rNumeric = /^\d+$/.test(r);
        if (lNumeric && rNumeric) {
            if (Number(l) !== Number(r)) {
                return Number(l) - Number(r);
            }
        } else if (lNumeric !== rNumeric) {
            return lNumeric ? -1 : 1;
        } else if (l !== r) {
            return l < r ? -1 : 1;
        }
    }
    return 0;
}

/**
 * Orders dotted version strings numerically; a leading `v` and `+build` metadata are ignored and
 * missing segments count as 0. A `-suffix` marks a pre-release, which ranks below the plain release.
 * @returns number - negative when a < b, 0 when equal, positive when a > b
 * @example
 * compareVersions('v1.10', '1.9'); // > 0
 * compareVersions('2.0', '2'); // 0
 * compareVersions('1.0-beta', '1.0'); // < 0
 */
export function compareVersions(a: string, b: string): number {
    const split = (version: string): { core: string[]; pre: string[] | null } => {
        const bare = version.trim().replace(/^v/i, ``).split(`+`)[0];
        const dash = bare.indexOf(`-`);
        if (dash < 0) {
            return { core: bare.split(`.`), pre: null };
        }
        return { core: bare.slice(0, dash).split(`.`), pre: bare.slice(dash + 1).split(`.`) };
    };
    const left = split(a);
    const right = split(b);

    const core = compareParts(left.core, right.core, true);
    if (core !== 0) {
        return core;
    }
    if (left.pre === null || right.pre === null) {
        return left.pre === right.pre ? 0 : left.pre === null ? 1 : -1;
    }
    return compareParts(left.pre, right.pre, false);
}

export type UpdateCallback = (report: UpdateReport) => void;

export class UpdateChecker {
    private _source: UpdateSource;
    private _eventBus: MainEventBus;

    constructor(source: UpdateSource, eventBus: MainEventBus = MAIN_EVENT_BUS) {
        this._source = source;
        this._eventBus = eventBus;
    }

    /**
     * Checks one mod and emits `update.checked`.
     * An update is available only when both versions are known and the remote one is newer.
     */
    public async Check(mod: Mod): Promise<UpdateReport> {
        const remote = await this._source.Latest(mod);
        const currentVersion = mod.version ?? null;
        const report: UpdateReport = {
            modId: mod.id,
            currentVersion,
            remoteVersion: remote.version,
            downloadUrl: remote.downloadUrl,
            updateAvailable:
                currentVersion !== null && remote.version !== null && compareVersions(remote.version, currentVersion) > 0,
        };
        this._eventBus.Emit(EVENT_NAMES.updateChecked, report);
        return report;
    }

    /**
     * Starts checking every mod that names a remote, one after another, and returns at once.
     * Each report goes to onReport and the bus; a failed check is logged and the rest continue.
     * @returns Promise<void> - Settles after the last check; callers may ignore it
     * @example
     * void checker.CheckInBackground(catalog, report => ui.ShowUpdate(report));
     */
    public CheckInBackground(mods: readonly Mod[], onReport?: UpdateCallback): Promise<void> {
        const candidates = mods.filter(mod => {
            return Boolean(mod.remoteUrl);
        });
        return (async () => {
            for (const mod of candidates) {
                try {
                    const report = await this.Check(mod);
                    onReport?.(report);
                } catch (err) {
                    log.warning(`Update check failed: ${ErrorMessage(err)}`, `UpdateChecker`, mod.id);
                }
            }
        })();
    }
}
