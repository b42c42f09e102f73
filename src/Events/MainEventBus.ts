/**
 * Central event bus through which the core reports to front ends and other collaborators.
 */
import { EventEmitter } from 'events';
import { EVENT_NAMES, type EventName } from '../Domain/Utility.js';
import type { CatalogScanResult, CatalogWarning } from '../Domain/Mod.js';
import type { LoadOrderView } from '../Domain/LoadOrder.js';
import type { LaunchCommand, LaunchResult, UpdateReport } from '../Domain/Launch.js';
import type { ValidatedConfig } from '../Types/Config.js';

/** Payload carried by each event. */
export interface EventPayloads {
    [EVENT_NAMES.configLoaded]: ValidatedConfig;
    [EVENT_NAMES.catalogScanned]: CatalogScanResult;
    [EVENT_NAMES.catalogWarning]: CatalogWarning;
    [EVENT_NAMES.loadOrderChanged]: LoadOrderView[];
    [EVENT_NAMES.presetSaved]: { name: string };
    [EVENT_NAMES.presetApplied]: { name: string; dropped: string[] };
    [EVENT_NAMES.presetDeleted]: { name: string };
    [EVENT_NAMES.mergeOverride]: { blockId: string; previous: string; next: string };
    [EVENT_NAMES.mergeCompleted]: { outputPath: string; blocks: number; overrides: number; contributors: string[] };
    [EVENT_NAMES.launchBuilt]: LaunchCommand;
    [EVENT_NAMES.launchStarted]: { pid?: number; command: LaunchCommand };
    [EVENT_NAMES.launchExited]: LaunchResult;
    [EVENT_NAMES.updateChecked]: UpdateReport;
}

/**
 * MainEventBus is the event system for all internal communication.
 * Used for core-to-front-end notifications.
 */
export class MainEventBus extends EventEmitter {
    /**
     * Creates a new MainEventBus instance.
     * @example
     * const bus = new MainEventBus();
     */
    constructor() {
        super();
    }
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, payload: EventPayloads[T]): boolean {
        return super.emit(eventName, payload);
    }
    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (payload: EventPayloads[T]) => void): this {
        super.on(eventName, listener);
        return this;
    }
    /** Typed off helper. */
    public Off<T extends EventName>(eventName: T, listener: (payload: EventPayloads[T]) => void): this {
        super.off(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance for the application.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On(EVENT_NAMES.mergeOverride, ({ blockId }) => ...);
 */
export const MAIN_EVENT_BUS = new MainEventBus();
