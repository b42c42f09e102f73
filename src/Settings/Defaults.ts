/**
 * Contents written when a settings file does not exist yet.
 */

/** Launcher-owned settings. Keys are read through LAUNCHER_KEYS. */
export const DEFAULT_LAUNCHER_SETTINGS = [
    `# Launcher settings`,
    `update_time=1`,
    `realtime=0`,
    `skipintro=0`,
    `merge_event_modifiers=1`,
    ``,
].join(`\n`);

export const LAUNCHER_KEYS = {
    updateTime: `update_time`,
    realtime: `realtime`,
    skipIntro: `skipintro`,
    mergeEventModifiers: `merge_event_modifiers`,
} as const;

/** Keys the game's own settings.txt is patched through. */
export const GAME_KEYS = {
    updateTime: `update_time`,
    resolutionX: `graphics.size.x`,
    resolutionY: `graphics.size.y`,
    fullScreen: `fullScreen`,
    borderless: `borderless`,
    masterVolume: `master_volume`,
    musicVolume: `music_volume`,
    soundFxVolume: `sound_fx_volume`,
    ambientVolume: `ambient_volume`,
    lastPlayer: `lastplayer`,
    autosave: `autosave`,
    debugSaves: `debug_saves`,
} as const;

/** Stock game settings.txt for a fresh user directory. */
export const DEFAULT_GAME_SETTINGS = `gui=
{
language=l_english
}
graphics=
{
size=
{
x=1920
y=1080
}

refreshRate=60
fullScreen=no
borderless=yes
shadows=no
shadowSize=2048
multi_sampling=0
anisotropic_filtering=0
gamma=50.000000
}
sound_fx_volume=100.000000
music_volume=100.000000
scroll_speed=50.000000
camera_rotation_speed=50.000000
zoom_speed=50.000000
mouse_speed=50.000000
master_volume=100.000000
ambient_volume=50.000000
mapRenderingOptions=
{
renderTrees=yes
onmap=yes
simpleWater=no
counter_distance=300.000000
text_height=300.000000
sea_text_alpha=120
details=1.000
}
lastplayer="Player"
lasthost=""
debug_saves=0
autosave="YEARLY"
simple=no
categories=
{
1 1 1 1 1 1 }
update_time=1.000000
shortcut=yes
`;

/** Game settings store decimals with six places. */
export function FormatGameDecimal(value: number): string {
    return value.toFixed(6);
}
