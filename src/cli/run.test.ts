import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventEmitter } from 'events';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough } from 'stream';
import { RenderBackendError } from '../core/errors';
import { run } from './run';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({ spawn: spawnMock }));

const INPUT = join(__dirname, '../../examples/ingest-pipeline.json');

/**
 * Stand-in for a dot process: writes `output` to the -o path (if given)
 * and exits with `code`
 */
function fakeDot(code: number, output?: string, stderr = '') {
  spawnMock.mockImplementation((_command: string, args: string[]) => {
    const proc = Object.assign(new EventEmitter(), {
      stdin: new PassThrough(),
      stdout: new PassThrough(),
      stderr: new PassThrough(),
      kill: vi.fn(() => true),
    });
    proc.stdin.resume();
    setImmediate(async () => {
      if (output !== undefined) {
        await writeFile(args[args.indexOf('-o') + 1], output);
      }
      if (stderr) proc.stderr.write(stderr);
      setTimeout(() => proc.emit('close', code, null), 5);
    });
    return proc;
  });
}

describe('run', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    spawnMock.mockReset();
    dir = await mkdtemp(join(tmpdir(), 'topodraw-cli-'));
    configPath = join(dir, 'topodraw.config.json');
    await writeFile(configPath, '{}');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('renders the document with flag overrides applied', async () => {
    fakeDot(0, '<svg/>');
    const messages: string[] = [];
    const output = join(dir, 'pipeline.png');

    const result = await run(
      INPUT,
      { config: configPath, output, format: 'svg', dot: '/opt/graphviz/bin/dot' },
      (message) => messages.push(message),
    );

    expect(result.outputPath).toBe(output);
    expect(result.format).toBe('svg');
    expect(await readFile(output, 'utf-8')).toBe('<svg/>');
    expect(spawnMock.mock.calls[0][0]).toBe('/opt/graphviz/bin/dot');
    expect(spawnMock.mock.calls[0][1].slice(0, 2)).toEqual(['-Tsvg', '-o']);
    expect(messages[messages.length - 1]).toBe('Render completed successfully');
  });

  it('writes the DOT source even when Graphviz fails', async () => {
    fakeDot(1, undefined, 'Error: syntax error\n');
    const emitted = join(dir, 'pipeline.dot');

    const error = await run(
      INPUT,
      { config: configPath, output: join(dir, 'pipeline.png'), emitDot: emitted },
      () => {},
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RenderBackendError);
    const source = await readFile(emitted, 'utf-8');
    expect(source.startsWith('digraph "Event Ingestion Pipeline" {\n')).toBe(true);
    expect(source.split('\n')).toContain('  n1 -> n2 [label="events"];');
    expect((await readdir(dir)).sort()).toEqual(['pipeline.dot', 'topodraw.config.json']);
  });

  it('rejects an invalid flag before touching Graphviz', async () => {
    await expect(
      run(INPUT, { config: configPath, timeout: '-5' }, () => {}),
    ).rejects.toThrow('Invalid timeout "-5"');
    expect(spawnMock).not.toHaveBeenCalled();
  });
});
