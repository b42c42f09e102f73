/**
 * Operations over load-order lists. Every function returns a new list and leaves its input untouched,
 * so a reader holding the previous value never sees a half-applied change.
 *
 * `position` is the entry's slot in display order and is renumbered densely after every change.
 * `loadIndex` numbers the enabled entries 0..N-1 in ascending position; disabled entries have none.
 */
import type { LoadOrderEntry, LoadOrderList, LoadOrderState, LoadOrderView } from '../Domain/LoadOrder.js';
import type { Mod, ModCatalog } from '../Domain/Mod.js';
import { NotFoundError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';

type EntryFlags = Pick<LoadOrderEntry, 'mod' | 'enabled'>;

/** Rebuilds positions 0..n-1 from array order and load indexes 0..N-1 over the enabled entries. */
function renumber(entries: readonly EntryFlags[]): LoadOrderList {
    let loadIndex = 0;
    return {
        entries: entries.map((entry, position) => {
            return { mod: entry.mod, enabled: entry.enabled, position, loadIndex: entry.enabled ? loadIndex++ : null };
        }),
    };
}

function compareIds(a: Mod, b: Mod): number {
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function indexOfId(list: LoadOrderList, id: string): number {
    const index = list.entries.findIndex(entry => {
        return entry.mod.id === id;
    });
    if (index < 0) {
        throw new NotFoundError(`Mod '${id}' is not in the load order`, { modId: id });
    }
    return index;
}

/** Empty list. */
export function emptyLoadOrder(): LoadOrderList {
    return { entries: [] };
}

/**
 * Merges a fresh catalog with previously persisted state.
 * Mods present in previousState keep their enabled flag and relative order; new mods are appended
 * disabled, sorted by id; mods missing from the catalog are dropped.
 * @example
 * const list = fromCatalog(scan.mods, await restore(statePath));
 */
export function fromCatalog(catalog: ModCatalog, previousState?: LoadOrderState | null): LoadOrderList {
    const byId = new Map(
        catalog.map(mod => {
            return [mod.id, mod];
        }),
    );
    const kept: EntryFlags[] = [];
    const seen = new Set<string>();

    const previous = [...(previousState?.entries ?? [])].sort((a, b) => {
        return a.position - b.position;
    });
    for (const stateEntry of previous) {
        const mod = byId.get(stateEntry.id);
        if (!mod || seen.has(stateEntry.id)) {
            if (!mod) {
                log.debug(`Dropping '${stateEntry.id}' from load order: no longer installed`, `LoadOrder`);
            }
            continue;
        }
        seen.add(stateEntry.id);
        kept.push({ mod, enabled: stateEntry.enabled });
    }

    const added = catalog
        .filter(mod => {
            return !seen.has(mod.id);
        })
        .sort(compareIds)
        .map(mod => {
            return { mod, enabled: false };
        });

    return renumber([...kept, ...added]);
}

/**
 * @throws NotFoundError when id is not in the list
 */
export function setEnabled(list: LoadOrderList, id: string, enabled: boolean): LoadOrderList {
    const index = indexOfId(list, id);
    if (list.entries[index].enabled === enabled) {
        return list;
    }
    return renumber(
        list.entries.map((entry, i) => {
            return i === index ? { mod: entry.mod, enabled } : entry;
        }),
    );
}

/**
 * Sets the enabled flag of exactly the given ids; every other entry is disabled.
 * Unknown ids are ignored.
 */
export function setEnabledMany(list: LoadOrderList, ids: Iterable<string>): LoadOrderList {
    const wanted = new Set(ids);
    return renumber(
        list.entries.map(entry => {
            return { mod: entry.mod, enabled: wanted.has(entry.mod.id) };
        }),
    );
}

/**
 * Enables exactly `ids`, in that order, ahead of every other entry; the rest are disabled and keep
 * their relative order. Ids not in the list are reported in `missing`.
 * @example
 * const { list: next, missing } = withEnabledOrder(list, ['PDM', 'HPM']);
 */
export function withEnabledOrder(list: LoadOrderList, ids: readonly string[]): { list: LoadOrderList; missing: string[] } {
    const byId = new Map(
        list.entries.map(entry => {
            return [entry.mod.id, entry.mod];
        }),
    );
    const missing: string[] = [];
    const enabled: EntryFlags[] = [];
    const taken = new Set<string>();

    for (const id of ids) {
        const mod = byId.get(id);
        if (!mod) {
            missing.push(id);
            continue;
        }
        if (!taken.has(id)) {
            taken.add(id);
            enabled.push({ mod, enabled: true });
        }
    }
    const rest = list.entries
        .filter(entry => {
            return !taken.has(entry.mod.id);
        })
        .map(entry => {
            return { mod: entry.mod, enabled: false };
        });
    return { list: renumber([...enabled, ...rest]), missing };
}

/**
 * Moves id to newPosition, clamped to [0, count-1], shifting the entries in between.
 * @throws NotFoundError when id is not in the list
 */
export function moveTo(list: LoadOrderList, id: string, newPosition: number): LoadOrderList {
    const from = indexOfId(list, id);
    const last = list.entries.length - 1;
    const to = Math.min(Math.max(Math.trunc(newPosition), 0), last);
    if (from === to) {
        return list;
    }
    const entries = [...list.entries];
    const [moved] = entries.splice(from, 1);
    entries.splice(to, 0, moved);
    return renumber(entries);
}

/** Enabled mods in load order. */
export function enabledInOrder(list: LoadOrderList): Mod[] {
    return list.entries
        .filter(entry => {
            return entry.enabled;
        })
        .map(entry => {
            return entry.mod;
        });
}

/**
 * Reorders enabled entries so every mod loads after the enabled mods it depends on
 * (descriptor `dependencies`, matched by display name or id). Independent mods keep their current
 * relative order. Disabled entries follow, in their current relative order.
 * On a dependency cycle the list is returned unchanged.
 */
export function sortByDependencies(list: LoadOrderList): LoadOrderList {
    const enabled = list.entries.filter(entry => {
        return entry.enabled;
    });
    const disabled = list.entries.filter(entry => {
        return !entry.enabled;
    });
    const byKey = new Map<string, number>();
    enabled.forEach((entry, index) => {
        byKey.set(entry.mod.name, index);
        byKey.set(entry.mod.id, index);
    });

    const inDegree = enabled.map(() => {
        return 0;
    });
    const dependents: number[][] = enabled.map(() => {
        return [];
    });
    enabled.forEach((entry, index) => {
        const deps = new Set<number>();
        for (const dependency of entry.mod.dependencies) {
            const target = byKey.get(dependency);
            if (target !== undefined && target !== index) {
                deps.add(target);
            }
        }
        for (const target of deps) {
            dependents[target].push(index);
            inDegree[index]++;
        }
    });

    // Kahn's algorithm, always taking the lowest current position that is ready.
    const ready = inDegree
        .map((degree, index) => {
            return degree === 0 ? index : -1;
        })
        .filter(index => {
            return index >= 0;
        });
    const order: number[] = [];
    while (ready.length > 0) {
        ready.sort((a, b) => {
            return a - b;
        });
        const next = ready.shift();
        if (next === undefined) {
            break;
        }
        order.push(next);
        for (const dependent of dependents[next]) {
            inDegree[dependent]--;
            if (inDegree[dependent] === 0) {
                ready.push(dependent);
            }
        }
    }

    if (order.length !== enabled.length) {
        log.warning(`Dependency cycle among enabled mods; load order left unchanged`, `LoadOrder`);
        return list;
    }
    return renumber([
        ...order.map(index => {
            return enabled[index];
        }),
        ...disabled,
    ]);
}

/**
 * User directory the game runs with: the `user_dir` of the last enabled mod that declares one.
 * @returns string - Empty when no enabled mod declares one
 */
export function resolveUserDir(list: LoadOrderList): string {
    let userDir = ``;
    for (const mod of enabledInOrder(list)) {
        if (mod.userDir) {
            userDir = mod.userDir;
        }
    }
    return userDir;
}

/** Rows for front ends. */
export function toView(list: LoadOrderList): LoadOrderView[] {
    return list.entries.map(entry => {
        return {
            id: entry.mod.id,
            name: entry.mod.name,
            enabled: entry.enabled,
            position: entry.position,
            loadIndex: entry.loadIndex,
        };
    });
}

/** Durable form of a list. */
export function toState(list: LoadOrderList): LoadOrderState {
    return {
        version: 1,
        entries: list.entries.map(entry => {
            return { id: entry.mod.id, enabled: entry.enabled, position: entry.position, loadIndex: entry.loadIndex };
        }),
    };
}
