import fs from 'fs/promises';
import path from 'path';
import {
    DIFF_TOOLS, PreviewSink, detectDiffTool, findExecutable, resolveDiffTool
} from '../src/preview-sink.js';
import { ConfigurationError } from '../src/errors.js';
import { CaptureLogger, CaptureSink, makeTempDir, removeDir } from './helpers.js';

async function writeScript(filePath: string, body: string, mode = 0o755): Promise<void> {
    await fs.writeFile(filePath, `#!/bin/sh\n${body}\n`, 'utf-8');
    await fs.chmod(filePath, mode);
}

const describeOnPosix = process.platform === 'win32' ? describe.skip : describe;

describeOnPosix('diff tool discovery', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('finds an executable file on PATH', async () => {
        await writeScript(path.join(dir, 'delta'), 'cat');
        expect(findExecutable('delta', { PATH: dir })).toBe(path.join(dir, 'delta'));
    });

    it('ignores files that are not executable and directories', async () => {
        await writeScript(path.join(dir, 'delta'), 'cat', 0o644);
        await fs.mkdir(path.join(dir, 'difftastic'));

        expect(findExecutable('delta', { PATH: dir })).toBeNull();
        expect(findExecutable('difftastic', { PATH: dir })).toBeNull();
    });

    it('picks the first installed tool in preference order', async () => {
        await writeScript(path.join(dir, 'diff-so-fancy'), 'cat');
        await writeScript(path.join(dir, 'difftastic'), 'cat');

        expect(detectDiffTool({ PATH: dir })).toEqual(DIFF_TOOLS[1]);
        expect(resolveDiffTool('auto', { PATH: dir })?.name).toBe('difftastic');
    });

    it('finds nothing on an empty PATH', () => {
        expect(detectDiffTool({ PATH: '' })).toBeNull();
        expect(detectDiffTool({})).toBeNull();
    });
});

describe('resolveDiffTool', () => {
    it('maps none to raw output', () => {
        expect(resolveDiffTool('none', {})).toBeNull();
    });

    it('returns a named tool without checking PATH', () => {
        expect(resolveDiffTool('delta', {})).toEqual({
            name: 'delta',
            command: 'delta',
            args: ['--no-gitconfig', '--side-by-side']
        });
    });

    it('rejects an unknown tool name', () => {
        expect(() => resolveDiffTool('meld', {})).toThrow(new ConfigurationError(
            "unknown diff tool 'meld' (expected one of: auto, none, delta, difftastic, diff-so-fancy)"
        ));
    });
});

describe('PreviewSink', () => {
    let dir: string;
    let output: CaptureSink;
    let logger: CaptureLogger;

    beforeEach(async () => {
        dir = await makeTempDir();
        output = new CaptureSink();
        logger = new CaptureLogger();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('writes raw text when no tool is configured', async () => {
        const sink = new PreviewSink(null, output, logger);
        await sink.show('-a\n+b\n');
        expect(sink.toolName).toBeNull();
        expect(output.text).toBe('-a\n+b\n');
    });

    it('ignores empty text', async () => {
        const sink = new PreviewSink(null, output, logger);
        await sink.show('');
        expect(output.text).toBe('');
    });

    it('falls back to raw text when the tool cannot be started', async () => {
        const sink = new PreviewSink(
            { name: 'fake', command: path.join(dir, 'does-not-exist'), args: [] },
            output,
            logger
        );

        await sink.show('-a\n+b\n');

        expect(output.text).toBe('-a\n+b\n');
        expect(logger.at('debug')[0]).toMatch(/^fake failed, showing raw diff: /);
    });

    describeOnPosix('with an external tool', () => {
        it('writes what the tool prints', async () => {
            const script = path.join(dir, 'pretty');
            await writeScript(script, "printf 'rendered:'\ncat");
            const sink = new PreviewSink({ name: 'pretty', command: script, args: [] }, output, logger);

            await sink.show('-a\n+b\n');

            expect(sink.toolName).toBe('pretty');
            expect(output.text).toBe('rendered:-a\n+b\n');
        });

        it('falls back to raw text when the tool exits non-zero', async () => {
            const script = path.join(dir, 'broken');
            await writeScript(script, 'cat > /dev/null\nexit 3');
            const sink = new PreviewSink({ name: 'broken', command: script, args: [] }, output, logger);

            await sink.show('-a\n+b\n');

            expect(output.text).toBe('-a\n+b\n');
            expect(logger.at('debug')).toEqual(['broken failed, showing raw diff: broken exited with code 3']);
        });
    });
});
