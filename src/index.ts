/**
 * Public API of the launcher core.
 */

export * from './Domain/index.js';

export {
    AppError,
    ConfigError,
    ERROR_CODES,
    ErrorMessage,
    FormatError,
    IOError,
    InvalidKeyError,
    KeyNotFoundError,
    MergeConflictError,
    NotFoundError,
    ParseError,
    ValidationError,
} from './Common/Errors.js';
export type { ErrorCode, ErrorDetails } from './Common/Errors.js';
export { log, LogLevel, SetLogLevel, GetLogLevel } from './Common/Log.js';
export type { LogThreshold } from './Common/Log.js';

export { MainEventBus, MAIN_EVENT_BUS } from './Events/MainEventBus.js';
export type { EventPayloads } from './Events/MainEventBus.js';

export type { AppConfig } from './Config.js';
export { ConfigPath, LoadConfig } from './Config.js';
export type { ValidatedConfig } from './Types/Config.js';
export { ConfigService, ResolveConfig } from './Services/ConfigService.js';
export { PathManager } from './Services/PathManager.js';

export { SettingKey } from './Settings/SettingKey.js';
export {
    getBool,
    getInteger,
    getNumber,
    getSetting,
    getSettingOr,
    getString,
    hasSetting,
    listSettings,
    loadOrCreateSettings,
    loadSettings,
    parseSettings,
    patchSetting,
    patchSettings,
    renderSettings,
    writeSettings,
} from './Settings/SettingsStore.js';
export { DEFAULT_GAME_SETTINGS, DEFAULT_LAUNCHER_SETTINGS, GAME_KEYS, LAUNCHER_KEYS } from './Settings/Defaults.js';
export { syncGameSettings } from './Settings/GameSettings.js';

export { scanCatalog } from './Catalog/ModCatalog.js';
export {
    emptyLoadOrder,
    enabledInOrder,
    fromCatalog,
    moveTo,
    resolveUserDir,
    setEnabled,
    setEnabledMany,
    sortByDependencies,
    toState,
    toView,
    withEnabledOrder,
} from './LoadOrder/LoadOrderList.js';
export { persist, restore } from './LoadOrder/LoadOrderStore.js';

export { MergeEngine, MergeFragments, EnsureOverrideMod } from './Merge/MergeEngine.js';
export type { MergeReport, MergedBlock, BlockOverride } from './Merge/MergeEngine.js';
export { PresetManager } from './Presets/PresetManager.js';

export { LaunchCommandBuilder, PriorityFromSetting } from './Launch/LaunchCommandBuilder.js';
export { LaunchRunner } from './Launch/LaunchRunner.js';
export type { RunningGame, SpawnFunction, SpawnedProcess } from './Launch/LaunchRunner.js';

export { defaultGameRootCandidates, findGameRoot } from './Game/GameLocator.js';
export { applySkipIntro, clearCache, savesDir } from './Game/GameFolders.js';
export { UpdateChecker, compareVersions } from './Services/UpdateChecker.js';
export type { UpdateSource, RemoteRelease } from './Services/UpdateChecker.js';
export { Launcher } from './Services/Launcher.js';
export type { LauncherOptions } from './Services/Launcher.js';
