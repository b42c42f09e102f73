/**
 * Domain interfaces and types of the launcher core.
 */

// Mods & catalog
export type { Mod, ModCatalog, CatalogWarning, CatalogScanResult, FragmentKind } from './Mod.js';
export { EVENT_MODIFIERS_FRAGMENT, OVERRIDE_MOD_ID } from './Mod.js';

// Load order
export type { LoadOrderEntry, LoadOrderList, LoadOrderState, LoadOrderStateEntry, LoadOrderView } from './LoadOrder.js';

// Presets
export type { Preset, PresetFile } from './Preset.js';

// Settings documents
export type { SettingValue, SettingsDocument, SettingEntry, SettingSection } from './Settings.js';

// Launch
export type { PriorityClass, LaunchCommand, LaunchResult, UpdateReport } from './Launch.js';

// Utility Types
export type { EventName } from './Utility.js';

// Event Names constant
export { EVENT_NAMES } from './Utility.js';
