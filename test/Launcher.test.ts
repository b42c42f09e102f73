import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import { PassThrough } from 'stream';
import { Launcher } from '../src/Services/Launcher.js';
import { LauncherApp, FormatView } from '../src/App.js';
import { ResolveConfig } from '../src/Services/ConfigService.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import type { SpawnedProcess } from '../src/Launch/LaunchRunner.js';
import type { ValidatedConfig } from '../src/Types/Config.js';
import { ConfigError, IOError, NotFoundError, ValidationError } from '../src/Common/Errors.js';
import { PathExists } from '../src/Common/AtomicFile.js';
import { MakeTempDir, RemoveDir, WriteTree } from './helpers/Fixtures.js';

class FakeChild extends EventEmitter implements SpawnedProcess {
    public readonly pid = 77;
    public readonly stdout = new PassThrough();
    public readonly stderr = new PassThrough();
}

function nextTurn(): Promise<void> {
    return new Promise(resolve => {
        setImmediate(resolve);
    });
}

describe('Launcher', () => {
    let root: string;
    let config: ValidatedConfig;
    let bus: MainEventBus;
    let child: FakeChild;
    let launcher: Launcher;
    const spawn = vi.fn(() => child);

    beforeEach(async () => {
        root = await MakeTempDir();
        await WriteTree(root, {
            'v2game.exe': 'binary',
            'movies/intro.wmv': 'video',
            'mod/PDM.mod': 'name = "Pop Demand"\npath = "mod/PDM"\nuser_dir = "PDM"\n',
            'mod/PDM/common/event_modifiers.txt': 'x = 1\n',
            'mod/HPM.mod': 'name = "HPM"\npath = "mod/HPM"\n',
            'mod/HPM/common/event_modifiers.txt': 'x = 2\ny = 3\n',
        });
        config = ResolveConfig({
            gameRoot: root,
            userDataRoot: path.join(root, 'data'),
            stateDir: path.join(root, 'state'),
        });
        bus = new MainEventBus();
        child = new FakeChild();
        spawn.mockClear();
        launcher = new Launcher(config, { eventBus: bus, spawn, setPriority: vi.fn() });
        await launcher.Refresh();
    });

    afterEach(async () => {
        await RemoveDir(root);
    });

    it('should list installed mods disabled after the first scan', () => {
        expect(launcher.View()).toEqual([
            { id: 'HPM', name: 'HPM', enabled: false, position: 0, loadIndex: null },
            { id: 'PDM', name: 'Pop Demand', enabled: false, position: 1, loadIndex: null },
        ]);
    });

    it('should persist load-order changes across instances', async () => {
        await launcher.Enable('HPM', true);
        await launcher.Enable('PDM', true);
        await launcher.Move('PDM', 0);

        const reopened = new Launcher(config, { eventBus: new MainEventBus() });
        await reopened.Refresh();

        expect(reopened.View().map(row => [row.id, row.loadIndex])).toEqual([
            ['PDM', 0],
            ['HPM', 1],
        ]);
        await expect(launcher.Enable('nope', true)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should start from an empty load order when the state file is damaged', async () => {
        const stateFile = path.join(config.stateDir, 'load_order.json');
        await fs.writeFile(stateFile, JSON.stringify({ version: 1, entries: [{ id: 'HPM' }] }));

        const reopened = new Launcher(config, { eventBus: new MainEventBus() });
        await reopened.Refresh();
        await reopened.Enable('PDM', true);

        expect(reopened.View().map(row => [row.id, row.enabled])).toEqual([
            ['HPM', false],
            ['PDM', true],
        ]);
        expect(JSON.parse(await fs.readFile(stateFile, 'utf-8')).entries[1]).toEqual({
            id: 'PDM',
            enabled: true,
            position: 1,
            loadIndex: 0,
        });
    });

    it('should keep the previous load order when it cannot be saved', async () => {
        await fs.mkdir(path.join(config.stateDir, 'load_order.json'), { recursive: true });

        await expect(launcher.Enable('PDM', true)).rejects.toBeInstanceOf(IOError);

        expect(launcher.View().map(row => row.enabled)).toEqual([false, false]);
    });

    it('should merge, sync game settings and start the game', async () => {
        await launcher.Enable('HPM', true);
        await launcher.Enable('PDM', true);
        await launcher.Move('PDM', 0);

        const game = await launcher.Launch();
        child.emit('close', 0);

        expect(game.pid).toBe(77);
        expect(spawn).toHaveBeenCalledWith(
            path.join(root, 'v2game.exe'),
            ['-mod=mod/PDM.mod', '-mod=mod/HPM.mod', '-mod=mod/z_launcher.mod'],
            { cwd: root, detached: true, stdio: ['ignore', 'pipe', 'pipe'] },
        );
        expect(await fs.readFile(path.join(root, 'mod', 'z_launcher', 'common', 'event_modifiers.txt'), 'utf-8')).toBe(
            '# HPM\nx=2\n# HPM\ny=3\n',
        );
        expect(launcher.UserDir()).toBe(path.join(root, 'data', 'PDM'));
        expect(await fs.readFile(path.join(root, 'data', 'PDM', 'settings.txt'), 'utf-8')).toContain('\nupdate_time=1.000000\n');
        expect((await game.exited).exitCode).toBe(0);
    });

    it('should keep the override mod out of the catalog after a launch', async () => {
        await launcher.Enable('PDM', true);
        const game = await launcher.Launch();
        child.emit('close', 0);
        await game.exited;

        await launcher.Refresh();

        expect(launcher.View().map(row => row.id)).toEqual(['HPM', 'PDM']);
    });

    it('should apply skipintro as soon as it is set', async () => {
        await launcher.SetSetting('skipintro', 1);

        expect(await PathExists(path.join(root, 'moviesdisabled', 'intro.wmv'))).toBe(true);
        expect(launcher.Settings()).toContainEqual({ key: 'skipintro', value: 1 });
        expect(await fs.readFile(path.join(config.stateDir, 'launcher_settings.txt'), 'utf-8')).toContain('\nskipintro=1\n');
    });

    it('should save and apply presets through the load order', async () => {
        await launcher.Enable('PDM', true);
        await launcher.SavePreset('solo');
        await launcher.Enable('PDM', false);
        await launcher.Enable('HPM', true);

        const view = await launcher.ApplyPreset('solo');

        expect(view.map(row => [row.id, row.enabled])).toEqual([
            ['PDM', true],
            ['HPM', false],
        ]);
        expect(await launcher.Presets()).toEqual(['solo']);
    });

    it('should require an update source for update checks', () => {
        expect(() => launcher.CheckUpdates()).toThrow(ConfigError);
    });
});

describe('LauncherApp', () => {
    let root: string;
    let lines: string[];
    let app: LauncherApp;

    beforeEach(async () => {
        root = await MakeTempDir();
        await WriteTree(root, {
            'mod/PDM.mod': 'name = "Pop Demand"\npath = "mod/PDM"\n',
            'mod/PDM/readme.txt': '',
            'mod/HPM.mod': 'name = "HPM"\npath = "mod/HPM"\n',
            'mod/HPM/readme.txt': '',
        });
        const bus = new MainEventBus();
        const launcher = new Launcher(ResolveConfig({ gameRoot: root, userDataRoot: path.join(root, 'data') }), {
            eventBus: bus,
        });
        await launcher.Refresh();
        lines = [];
        app = new LauncherApp(bus, {}, line => {
            lines.push(line);
        });
        app.Attach(launcher);
    });

    afterEach(async () => {
        await RemoveDir(root);
    });

    it('should render load-order rows', () => {
        expect(FormatView([])).toEqual(['(no mods installed)']);
        expect(
            FormatView([
                { id: 'PDM', name: 'Pop Demand', enabled: true, position: 0, loadIndex: 0 },
                { id: 'HPM', name: 'HPM', enabled: false, position: 1, loadIndex: null },
            ]),
        ).toEqual(['[x]   1  PDM (Pop Demand)', '[ ]   -  HPM']);
    });

    it('should enable and move mods from commands', async () => {
        await app.HandleInput('enable PDM');
        lines = [];
        await app.HandleInput('MOVE PDM 0');

        expect(lines).toEqual(['[x]   1  PDM (Pop Demand)', '[ ]   -  HPM']);
    });

    it('should report presets and settings', async () => {
        await app.HandleInput('presets');
        await app.HandleInput('set update_time 2');

        expect(lines).toEqual(['(no presets)', 'update_time = 2']);
    });

    it('should reject malformed arguments and unknown commands', async () => {
        await expect(app.HandleInput('move PDM first')).rejects.toBeInstanceOf(ValidationError);
        await expect(app.HandleInput('enable')).rejects.toThrow('Missing id');
        await app.HandleInput('dance');

        expect(lines).toEqual(["Unknown command 'dance'; type help"]);
    });

    it('should stop on quit', async () => {
        expect(app.Running).toBe(true);
        await app.HandleInput('quit');
        expect(app.Running).toBe(false);
    });

    it('should print the game exit once it happens', async () => {
        const child = new FakeChild();
        const bus = new MainEventBus();
        await WriteTree(root, { 'v2game.exe': 'binary' });
        const launcher = new Launcher(ResolveConfig({ gameRoot: root, userDataRoot: path.join(root, 'data') }), {
            eventBus: bus,
            spawn: () => child,
            setPriority: vi.fn(),
        });
        await launcher.Refresh();
        app.Attach(launcher);

        await app.HandleInput('launch');
        child.emit('close', 0);
        await nextTurn();

        expect(lines).toEqual(['Game started (pid 77)', 'Game exited with code 0']);
    });
});
