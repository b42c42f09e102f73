import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { AvailableDrives, defaultGameRootCandidates, findGameRoot } from '../src/Game/GameLocator.js';
import { applySkipIntro, clearCache, savesDir } from '../src/Game/GameFolders.js';
import { syncGameSettings } from '../src/Settings/GameSettings.js';
import { getSetting, parseSettings } from '../src/Settings/SettingsStore.js';
import { DEFAULT_GAME_SETTINGS } from '../src/Settings/Defaults.js';
import { PathExists } from '../src/Common/AtomicFile.js';
import { MakeTempDir, RemoveDir, WriteTree } from './helpers/Fixtures.js';

describe('GameLocator', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await MakeTempDir();
    });

    afterEach(async () => {
        await RemoveDir(dir);
    });

    it('should try the launcher directory, its parent, then each drive', () => {
        expect(defaultGameRootCandidates('/games/v2/launcher', ['C:\\'])).toEqual([
            '/games/v2/launcher',
            '/games/v2',
            'C:\\Program Files (x86)\\Steam\\steamapps\\common\\Victoria 2',
            'C:\\GOG Games\\Victoria II',
        ]);
        expect(defaultGameRootCandidates('/', [])).toEqual(['/']);
    });

    it('should return the first candidate holding the executable', async () => {
        await WriteTree(dir, { 'a/readme.txt': '', 'b/v2game.exe': 'binary', 'c/v2game.exe': 'binary' });
        await fs.mkdir(path.join(dir, 'd', 'v2game.exe'), { recursive: true });

        const candidates = ['', path.join(dir, 'a'), path.join(dir, 'd'), path.join(dir, 'b'), path.join(dir, 'c')];

        expect(await findGameRoot(candidates, 'v2game.exe')).toBe(path.join(dir, 'b'));
        expect(await findGameRoot([path.join(dir, 'a')], 'v2game.exe')).toBeNull();
    });

    it('should list no drives outside Windows', async () => {
        expect(await AvailableDrives('linux')).toEqual([]);
    });
});

describe('GameFolders', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await MakeTempDir();
    });

    afterEach(async () => {
        await RemoveDir(dir);
    });

    it('should rename the movies folder both ways', async () => {
        await WriteTree(dir, { 'movies/intro.wmv': 'video' });

        expect(await applySkipIntro(dir, true)).toBe(true);
        expect(await PathExists(path.join(dir, 'moviesdisabled', 'intro.wmv'))).toBe(true);
        expect(await applySkipIntro(dir, true)).toBe(false);

        expect(await applySkipIntro(dir, false)).toBe(true);
        expect(await PathExists(path.join(dir, 'movies', 'intro.wmv'))).toBe(true);
    });

    it('should not rename over an existing folder', async () => {
        await WriteTree(dir, { 'movies/a.wmv': '', 'moviesdisabled/b.wmv': '' });

        expect(await applySkipIntro(dir, true)).toBe(false);
        expect(await PathExists(path.join(dir, 'movies', 'a.wmv'))).toBe(true);
    });

    it('should remove only cache folders that exist', async () => {
        await WriteTree(dir, { 'map/cache.bin': '', 'music/list.txt': '', 'save games/a.v2': 'save' });

        expect(await clearCache(dir)).toEqual(['map', 'music']);
        expect(await PathExists(path.join(dir, 'map'))).toBe(false);
        expect(await PathExists(path.join(dir, 'save games', 'a.v2'))).toBe(true);
        expect(await clearCache(dir)).toEqual([]);
    });

    it('should create the saves folder on demand', async () => {
        const saves = await savesDir(path.join(dir, 'PDM'));

        expect(saves).toBe(path.join(dir, 'PDM', 'save games'));
        expect((await fs.stat(saves)).isDirectory()).toBe(true);
    });
});

describe('syncGameSettings', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await MakeTempDir();
    });

    afterEach(async () => {
        await RemoveDir(dir);
    });

    it('should create game settings from the template with the launcher update_time', async () => {
        const file = path.join(dir, 'PDM', 'settings.txt');

        const doc = await syncGameSettings(file, parseSettings('update_time=3\n'));

        expect(getSetting(doc, 'update_time')).toBe('3.000000');
        expect(await fs.readFile(file, 'utf-8')).toBe(DEFAULT_GAME_SETTINGS.replace('update_time=1.000000', 'update_time=3.000000'));
    });

    it('should patch only the update_time line of an existing file', async () => {
        const file = path.join(dir, 'settings.txt');
        await fs.writeFile(file, 'lastplayer="Me"\r\nupdate_time=1.000000\r\n');

        await syncGameSettings(file, parseSettings('update_time=0.5\n'));

        expect(await fs.readFile(file, 'utf-8')).toBe('lastplayer="Me"\r\nupdate_time=0.500000\r\n');
    });

    it('should leave the file alone when the value already matches', async () => {
        const file = path.join(dir, 'settings.txt');
        await fs.writeFile(file, 'update_time=1.000000\n');
        const before = await fs.stat(file);

        await syncGameSettings(file, parseSettings('# no update_time\n'));

        expect((await fs.stat(file)).ino).toBe(before.ino);
        expect(await fs.readFile(file, 'utf-8')).toBe('update_time=1.000000\n');
    });
});
