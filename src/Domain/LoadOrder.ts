/**
 * Load-order model. Lists are values: every operation returns a new list.
 */
import type { Mod } from './Mod.js';

export interface LoadOrderEntry {
    readonly mod: Mod;
    readonly enabled: boolean;
    /** Display slot, 0..count-1. Disabled entries keep theirs so front ends can show them in place. */
    readonly position: number;
    /** Dense index among enabled entries (0..enabled-1) in ascending position; null when disabled. */
    readonly loadIndex: number | null;
}

export interface LoadOrderList {
    readonly entries: readonly LoadOrderEntry[];
}

/** Durable form of one entry: id and flags only. */
export interface LoadOrderStateEntry {
    id: string;
    enabled: boolean;
    position: number;
    /** Written for readers of the file; `restore` orders by position. */
    loadIndex?: number | null;
}

/** What `persist` writes and `restore` reads back. */
export interface LoadOrderState {
    version: 1;
    entries: LoadOrderStateEntry[];
}

/** Row handed to front ends. */
export interface LoadOrderView {
    id: string;
    name: string;
    enabled: boolean;
    position: number;
    /** Load index among enabled entries, null when disabled. */
    loadIndex: number | null;
}
