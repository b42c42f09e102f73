/**
 * Central enumeration of well-known event names for typed event bus helpers.
 * Extend as new events are introduced.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    catalogScanned: 'catalog.scanned',
    catalogWarning: 'catalog.warning',
    loadOrderChanged: 'loadOrder.changed',
    presetSaved: 'preset.saved',
    presetApplied: 'preset.applied',
    presetDeleted: 'preset.deleted',
    mergeOverride: 'merge.override',
    mergeCompleted: 'merge.completed',
    launchBuilt: 'launch.built',
    launchStarted: 'launch.started',
    launchExited: 'launch.exited',
    updateChecked: 'update.checked',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
