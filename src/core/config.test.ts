import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from './config';
import { ConfigError } from './errors';

describe('parseConfig', () => {
  it('returns the defaults for an empty object', () => {
    expect(parseConfig('{}', 'topodraw.json')).toEqual(DEFAULT_CONFIG);
  });

  it('merges nested sections key by key', () => {
    const config = parseConfig(
      JSON.stringify({
        render: { format: 'svg', dotArgs: ['-Gdpi=150'] },
        graph: { direction: 'left-to-right' },
      }),
      'topodraw.json',
    );

    expect(config.render).toEqual({
      dotPath: 'dot',
      format: 'svg',
      outputDir: '.',
      timeoutMs: 30000,
      dotArgs: ['-Gdpi=150'],
    });
    expect(config.graph).toEqual({
      direction: 'left-to-right',
      fontName: 'Sans-Serif',
      fontSize: 13,
    });
    expect(DEFAULT_CONFIG.render.format).toBe('png');
  });

  it('reads kind overrides', () => {
    const config = parseConfig(
      JSON.stringify({
        kinds: { mainframe: { shape: 'box3d', fillcolor: '#CCCCCC', fontcolor: '#000000' } },
      }),
      'topodraw.json',
    );
    expect(config.kinds).toEqual({
      mainframe: { shape: 'box3d', fillcolor: '#CCCCCC', fontcolor: '#000000' },
    });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseConfig('{ "render": ', 'broken.json')).toThrow(
      /^Invalid JSON in broken\.json: /,
    );
    expect(() => parseConfig('{ "render": ', 'broken.json')).toThrow(ConfigError);
  });

  it('lists every invalid key', () => {
    expect(() =>
      parseConfig(
        JSON.stringify({ render: { timeoutMs: -1 }, graph: { rankdir: 'LR' } }),
        'topodraw.json',
      ),
    ).toThrow(
      "Invalid config in topodraw.json: render.timeoutMs: Number must be greater than or equal to 0; graph: Unrecognized key(s) in object: 'rankdir'",
    );
  });

  it('rejects unsupported formats', () => {
    expect(() => parseConfig('{"render":{"format":"gif"}}', 'topodraw.json')).toThrow(
      /^Invalid config in topodraw\.json: render\.format: /,
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'topodraw-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads an explicitly named file', async () => {
    const path = join(dir, 'custom.json');
    await writeFile(path, JSON.stringify({ render: { dotPath: '/usr/local/bin/dot' } }));

    expect(loadConfig(path).render.dotPath).toBe('/usr/local/bin/dot');
  });

  it('fails when an explicitly named file is missing', () => {
    const path = join(dir, 'missing.json');
    expect(() => loadConfig(path)).toThrow(new ConfigError(`Config file not found: ${path}`));
  });

  it('fails when an explicitly named file is invalid', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, JSON.stringify({ graph: { fontSize: 0 } }));

    expect(() => loadConfig(path)).toThrow(ConfigError);
  });
});
