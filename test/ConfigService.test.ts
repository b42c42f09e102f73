import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ApplyEnvOverrides, ConfigPath, DEFAULT_CONFIG_PATH } from '../src/Config.js';
import { ConfigService, ResolveConfig } from '../src/Services/ConfigService.js';
import { PathManager } from '../src/Services/PathManager.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { EVENT_NAMES } from '../src/Domain/Utility.js';
import type { ValidatedConfig } from '../src/Types/Config.js';
import { IOError, ParseError, ValidationError } from '../src/Common/Errors.js';
import { MakeTempDir, RemoveDir } from './helpers/Fixtures.js';

const HOME = path.resolve('/home/player');

describe('ResolveConfig', () => {
    it('should fill defaults from the game root', () => {
        const gameRoot = path.resolve('/games/v2');

        expect(ResolveConfig({ gameRoot }, HOME)).toEqual({
            gameRoot,
            executable: 'v2game.exe',
            modsDir: path.join(gameRoot, 'mod'),
            userDataRoot: path.join(HOME, 'Documents', 'Paradox Interactive', 'Victoria II'),
            stateDir: path.join(gameRoot, 'mod', '.launcher'),
            logLevel: 'info',
        });
    });

    it('should expand the home directory and keep explicit values', () => {
        const config = ResolveConfig(
            { gameRoot: '/games/v2', userDataRoot: '~/v2data', stateDir: '~/state', modsDir: 'mods', logLevel: 'debug' },
            HOME,
        );

        expect(config.userDataRoot).toBe(path.join(HOME, 'v2data'));
        expect(config.stateDir).toBe(path.join(HOME, 'state'));
        expect(config.modsDir).toBe(path.join(path.resolve('/games/v2'), 'mods'));
        expect(config.logLevel).toBe('debug');
    });

    it('should reject invalid settings', () => {
        expect(() => ResolveConfig({}, HOME)).toThrow('Config validation error: "gameRoot" is required');
        expect(() => ResolveConfig(null, HOME)).toThrow(ValidationError);
        expect(() => ResolveConfig({ gameRoot: '/g', logLevel: 'loud' }, HOME)).toThrow(ValidationError);
        expect(() => ResolveConfig({ gameRoot: '/g', executable: path.resolve('/bin/game') }, HOME)).toThrow(
            ValidationError,
        );
    });
});

describe('ApplyEnvOverrides', () => {
    it('should let environment variables win over the file', () => {
        const merged = ApplyEnvOverrides(
            { gameRoot: '/from/file', extra: 1 },
            { LAUNCHER_GAME_ROOT: '/from/env', LAUNCHER_LOG_LEVEL: 'debug', LAUNCHER_STATE_DIR: '' },
        );

        expect(merged).toEqual({ gameRoot: '/from/env', extra: 1, logLevel: 'debug' });
    });

    it('should treat an empty document as empty settings and reject other shapes', () => {
        expect(ApplyEnvOverrides(null, {})).toEqual({});
        expect(() => ApplyEnvOverrides(['gameRoot'], {})).toThrow(ValidationError);
    });

    it('should read the config path from CONFIG_PATH', () => {
        expect(ConfigPath({ CONFIG_PATH: '/etc/launcher.json' })).toBe('/etc/launcher.json');
        expect(ConfigPath({})).toBe(DEFAULT_CONFIG_PATH);
    });
});

describe('ConfigService', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await MakeTempDir();
    });

    afterEach(async () => {
        await RemoveDir(dir);
    });

    it('should load a YAML file and emit config.loaded', async () => {
        const file = path.join(dir, 'launcher.config.yaml');
        await fs.writeFile(file, `gameRoot: ${JSON.stringify(dir)}\nlogLevel: warn\n`);
        const bus = new MainEventBus();
        const loaded: ValidatedConfig[] = [];
        bus.On(EVENT_NAMES.configLoaded, config => loaded.push(config));

        const config = await new ConfigService(bus, {}).Load(file);

        expect(config.gameRoot).toBe(dir);
        expect(config.logLevel).toBe('warn');
        expect(loaded).toEqual([config]);
    });

    it('should load a JSON file with environment overrides', async () => {
        const file = path.join(dir, 'launcher.config.json');
        await fs.writeFile(file, JSON.stringify({ gameRoot: '/from/file' }));

        const config = await new ConfigService(new MainEventBus(), { LAUNCHER_GAME_ROOT: dir }).Load(file);

        expect(config.gameRoot).toBe(dir);
    });

    it('should fail on missing, unsupported or malformed files', async () => {
        const service = new ConfigService(new MainEventBus(), {});
        const toml = path.join(dir, 'launcher.toml');
        const broken = path.join(dir, 'broken.yaml');
        await fs.writeFile(toml, 'gameRoot = "x"');
        await fs.writeFile(broken, 'gameRoot: [unclosed');

        await expect(service.Load(path.join(dir, 'none.yaml'))).rejects.toBeInstanceOf(IOError);
        await expect(service.Load(toml)).rejects.toBeInstanceOf(ParseError);
        await expect(service.Load(broken)).rejects.toBeInstanceOf(ParseError);
    });

    it('should build the config from the environment alone', () => {
        expect(new ConfigService(new MainEventBus(), { LAUNCHER_GAME_ROOT: dir }).FromEnvironment().gameRoot).toBe(dir);
        expect(() => new ConfigService(new MainEventBus(), {}).FromEnvironment()).toThrow(ValidationError);
    });
});

describe('PathManager', () => {
    it('should derive state and user paths from the config', async () => {
        const dir = await MakeTempDir();
        try {
            const paths = new PathManager(ResolveConfig({ gameRoot: dir, userDataRoot: path.join(dir, 'data') }, HOME));

            expect(paths.Executable()).toBe(path.join(dir, 'v2game.exe'));
            expect(paths.LoadOrderFile()).toBe(path.join(dir, 'mod', '.launcher', 'load_order.json'));
            expect((await fs.stat(paths.StateDir())).isDirectory()).toBe(true);
            expect(paths.MergedArtifact()).toBe(path.join(dir, 'mod', 'z_launcher', 'common', 'event_modifiers.txt'));
            expect(paths.UserDir('')).toBe(path.join(dir, 'data'));
            expect(paths.GameSettingsFile('PDM')).toBe(path.join(dir, 'data', 'PDM', 'settings.txt'));
        } finally {
            await RemoveDir(dir);
        }
    });
});
