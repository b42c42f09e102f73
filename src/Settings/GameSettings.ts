/**
 * Carries launcher choices into the game's own settings.txt before a launch.
 */
import type { SettingsDocument } from '../Domain/Settings.js';
import { log } from '../Common/Log.js';
import { DEFAULT_GAME_SETTINGS, FormatGameDecimal, GAME_KEYS, LAUNCHER_KEYS } from './Defaults.js';
import { getNumber, loadOrCreateSettings, patchSetting, renderSettings, writeSettings } from './SettingsStore.js';

/**
 * Writes the launcher's `update_time` into the game settings as a six-decimal number, creating the
 * game settings from the stock template when the user directory has none yet.
 * The file is rewritten only when the line changes.
 * @param gameSettingsPath string - `<user dir>/settings.txt`
 * @param launcherSettings SettingsDocument - Launcher settings document
 * @returns Promise<SettingsDocument> - Game settings as written
 * @example
 * await syncGameSettings(paths.GameSettingsFile(userDir), launcherSettings);
 */
export async function syncGameSettings(gameSettingsPath: string, launcherSettings: SettingsDocument): Promise<SettingsDocument> {
    const game = await loadOrCreateSettings(gameSettingsPath, DEFAULT_GAME_SETTINGS);
    const updateTime = getNumber(launcherSettings, LAUNCHER_KEYS.updateTime, 1);
    const next = patchSetting(game, GAME_KEYS.updateTime, FormatGameDecimal(updateTime));

    if (renderSettings(next) !== renderSettings(game)) {
        await writeSettings(next);
        log.debug(`Game update_time set to ${FormatGameDecimal(updateTime)}`, `GameSettings`, gameSettingsPath);
    }
    return next;
}
