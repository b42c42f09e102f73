import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { FragmentSyntaxError, ParseFragment } from '../src/Merge/FragmentParser.js';
import {
    EnsureOverrideMod,
    MergeEngine,
    MergeFragments,
    OVERRIDE_MOD_DESCRIPTOR,
    RenderMerged,
} from '../src/Merge/MergeEngine.js';
import { MainEventBus, type EventPayloads } from '../src/Events/MainEventBus.js';
import { EVENT_NAMES } from '../src/Domain/Utility.js';
import { MergeConflictError } from '../src/Common/Errors.js';
import { PathExists } from '../src/Common/AtomicFile.js';
import { MakeMod, MakeTempDir, RemoveDir, WriteTree } from './helpers/Fixtures.js';

describe('ParseFragment', () => {
    it('should split single-line blocks in file order', () => {
        expect(ParseFragment('# header\na = 1\n\nb = { x = 2 }\n')).toEqual([
            { id: 'a', value: '1', line: 2 },
            { id: 'b', value: '{ x = 2 }', line: 4 },
        ]);
    });

    it('should join a block whose braces span several lines', () => {
        const text = 'war_malus =\r\n{\r\n    war_exhaustion = 0.1 # per month\r\n    icon = 4\r\n}\r\nnext = 2';

        expect(ParseFragment(text)).toEqual([
            { id: 'war_malus', value: '{\n    war_exhaustion = 0.1 # per month\n    icon = 4\n}', line: 1 },
            { id: 'next', value: '2', line: 6 },
        ]);
    });

    it('should ignore braces inside quotes and comments', () => {
        expect(ParseFragment('a = { name = "}" # }\n}')).toEqual([{ id: 'a', value: '{ name = "}" # }\n}', line: 1 }]);
    });

    it('should report malformed text with its line', () => {
        const cases: Array<[string, string, number]> = [
            ['a = 1\njunk', "Expected 'id = value' but found 'junk'", 2],
            ['= 1', 'Block has an empty identifier', 1],
            ['a b = 1', "Invalid block identifier 'a b'", 1],
            ['a =\n\n', "Block 'a' has no value", 1],
            ['a = 1 }', "Unexpected '}' in block 'a'", 1],
            ['x = 1\na = {\n  b = 2\n', "Block 'a' is never closed", 2],
        ];

        for (const [text, message, line] of cases) {
            let caught: unknown;
            try {
                ParseFragment(text);
            } catch (err) {
                caught = err;
            }
            expect(caught).toBeInstanceOf(FragmentSyntaxError);
            if (caught instanceof FragmentSyntaxError) {
                expect(caught.message).toBe(message);
                expect(caught.line).toBe(line);
            }
        }
    });
});

describe('MergeFragments', () => {
    it('should let the later mod win while keeping the first position', () => {
        const result = MergeFragments([
            { modId: 'a', file: 'a.txt', text: 'x = 1\ny = { v = 1 }' },
            { modId: 'b', file: 'b.txt', text: 'x = 2\nz = 3' },
        ]);

        expect(result.blocks).toEqual([
            { id: 'x', value: '2', source: 'b' },
            { id: 'y', value: '{ v = 1 }', source: 'a' },
            { id: 'z', value: '3', source: 'b' },
        ]);
        expect(result.overrides).toEqual([{ blockId: 'x', previous: 'a', next: 'b' }]);
        expect(result.contributors).toEqual(['a', 'b']);
        expect(RenderMerged(result.blocks)).toBe('# b\nx=2\n# a\ny={ v = 1 }\n# b\nz=3\n');
    });

    it('should not count an identical re-declaration as an override', () => {
        const result = MergeFragments([
            { modId: 'a', file: 'a.txt', text: 'x = 1' },
            { modId: 'b', file: 'b.txt', text: 'x =   1  ' },
        ]);

        expect(result.overrides).toEqual([]);
        expect(result.blocks).toEqual([{ id: 'x', value: '1', source: 'a' }]);
        expect(result.contributors).toEqual(['a', 'b']);
    });

    it('should leave fragments without blocks out of the contributors', () => {
        const result = MergeFragments([
            { modId: 'a', file: 'a.txt', text: '# nothing yet\n' },
            { modId: 'b', file: 'b.txt', text: 'x = 1' },
        ]);

        expect(result.contributors).toEqual(['b']);
    });

    it('should produce the same output for the same input', () => {
        const sources = [
            { modId: 'a', file: 'a.txt', text: 'x = 1\ny = 2' },
            { modId: 'b', file: 'b.txt', text: 'y = 3' },
        ];

        expect(RenderMerged(MergeFragments(sources).blocks)).toBe(RenderMerged(MergeFragments(sources).blocks));
    });

    it('should name the mod, file and line of a malformed fragment', () => {
        let caught: unknown;
        try {
            MergeFragments([
                { modId: 'a', file: 'a.txt', text: 'x = 1' },
                { modId: 'b', file: 'b.txt', text: 'x = 1\nbroken' },
            ]);
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(MergeConflictError);
        if (caught instanceof MergeConflictError) {
            expect(caught.message).toBe(
                "Malformed event modifiers in mod 'b' (b.txt, line 2): Expected 'id = value' but found 'broken'",
            );
            expect([caught.modId, caught.file, caught.line]).toEqual(['b', 'b.txt', 2]);
        }
    });
});

describe('MergeEngine', () => {
    let root: string;
    let bus: MainEventBus;
    let engine: MergeEngine;

    const fragment = (id: string): string => path.join(root, id, 'common', 'event_modifiers.txt');

    beforeEach(async () => {
        root = await MakeTempDir();
        bus = new MainEventBus();
        engine = new MergeEngine(bus);
        await WriteTree(root, {
            'a/common/event_modifiers.txt': 'x = 1\ny = 2\n',
            'b/common/event_modifiers.txt': 'x = 5\n',
        });
    });

    afterEach(async () => {
        await RemoveDir(root);
    });

    it('should write the merged artifact and emit the overrides', async () => {
        const output = path.join(root, 'z_launcher', 'common', 'event_modifiers.txt');
        const overrides: Array<EventPayloads['merge.override']> = [];
        const completed: Array<EventPayloads['merge.completed']> = [];
        bus.On(EVENT_NAMES.mergeOverride, payload => overrides.push(payload));
        bus.On(EVENT_NAMES.mergeCompleted, payload => completed.push(payload));

        const report = await engine.Merge(
            [
                MakeMod('a', { fragments: { eventModifiers: fragment('a') } }),
                MakeMod('gone', { fragments: { eventModifiers: fragment('gone') } }),
                MakeMod('plain'),
                MakeMod('b', { fragments: { eventModifiers: fragment('b') } }),
            ],
            output,
        );

        expect(report.content).toBe('# b\nx=5\n# a\ny=2\n');
        expect(await fs.readFile(output, 'utf-8')).toBe(report.content);
        expect(overrides).toEqual([{ blockId: 'x', previous: 'a', next: 'b' }]);
        expect(completed).toEqual([{ outputPath: output, blocks: 2, overrides: 1, contributors: ['a', 'b'] }]);
    });

    it('should fail without writing when a fragment cannot be read', async () => {
        const output = path.join(root, 'out.txt');
        await fs.mkdir(fragment('c'), { recursive: true });

        const caught = await engine
            .Merge(
                [
                    MakeMod('a', { fragments: { eventModifiers: fragment('a') } }),
                    MakeMod('c', { fragments: { eventModifiers: fragment('c') } }),
                ],
                output,
            )
            .catch((err: unknown) => err);

        expect(caught).toBeInstanceOf(MergeConflictError);
        if (caught instanceof MergeConflictError) {
            expect(caught.modId).toBe('c');
            expect(caught.file).toBe(fragment('c'));
        }
        expect(await PathExists(output)).toBe(false);
    });

    it('should reject a fragment that is not valid UTF-8', async () => {
        const output = path.join(root, 'out.txt');
        await fs.mkdir(path.dirname(fragment('m')), { recursive: true });
        await fs.writeFile(fragment('m'), Buffer.from([0x61, 0x3d, 0xff, 0x0a]));

        const caught = await engine
            .Merge([MakeMod('m', { fragments: { eventModifiers: fragment('m') } })], output)
            .catch((err: unknown) => err);

        expect(caught).toBeInstanceOf(MergeConflictError);
        if (caught instanceof MergeConflictError) {
            expect(caught.message).toBe("Event modifiers of mod 'm' are not valid UTF-8");
            expect([caught.modId, caught.file]).toEqual(['m', fragment('m')]);
        }
        expect(await PathExists(output)).toBe(false);
    });

    it('should create the override mod once and keep existing files', async () => {
        await EnsureOverrideMod(root);
        expect(await fs.readFile(path.join(root, 'z_launcher.mod'), 'utf-8')).toBe(OVERRIDE_MOD_DESCRIPTOR);
        expect(await PathExists(path.join(root, 'z_launcher', 'readme.txt'))).toBe(true);

        await fs.writeFile(path.join(root, 'z_launcher.mod'), 'name = "custom"\n');
        await EnsureOverrideMod(root);

        expect(await fs.readFile(path.join(root, 'z_launcher.mod'), 'utf-8')).toBe('name = "custom"\n');
    });
});
