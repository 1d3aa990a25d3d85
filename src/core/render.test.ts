import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { assemble, diagram } from './diagram';
import { RenderBackendError } from './errors';
import { openGraph } from './graph';
import { formatFromPath, renderGraph, resolveOutput, slugify } from './render';
import type { GraphRenderer, RenderRequest } from './renderers/types';

class RecordingRenderer implements GraphRenderer {
  calls: Array<{ source: string; request: RenderRequest }> = [];

  async render(source: string, request: RenderRequest): Promise<void> {
    this.calls.push({ source, request });
  }
}

class FailingRenderer implements GraphRenderer {
  async render(): Promise<void> {
    throw new RenderBackendError('Graphviz exited with code 1', {
      command: ['dot'],
      exitCode: 1,
      stderr: 'syntax error',
    });
  }
}

describe('formatFromPath', () => {
  it('maps known image extensions', () => {
    expect(formatFromPath('out/diagram.png')).toBe('png');
    expect(formatFromPath('diagram.SVG')).toBe('svg');
    expect(formatFromPath('diagram.pdf')).toBe('pdf');
    expect(formatFromPath('diagram.jpg')).toBe('jpg');
    expect(formatFromPath('diagram.jpeg')).toBe('jpg');
  });

  it('returns null for other extensions and bare names', () => {
    expect(formatFromPath('diagram.txt')).toBeNull();
    expect(formatFromPath('out/diagram')).toBeNull();
  });
});

describe('slugify', () => {
  it('lowercases and joins words with underscores', () => {
    expect(slugify('Online Marketplace Architecture')).toBe(
      'online_marketplace_architecture',
    );
    expect(slugify('  API Gateway & Security!  ')).toBe('api_gateway_security');
  });

  it('falls back to "diagram" when nothing usable is left', () => {
    expect(slugify('')).toBe('diagram');
    expect(slugify('***')).toBe('diagram');
  });
});

describe('resolveOutput', () => {
  it('derives the path from the title', () => {
    expect(resolveOutput('Online Marketplace Architecture')).toEqual({
      outputPath: 'online_marketplace_architecture.png',
      format: 'png',
    });
    expect(resolveOutput('Shop', { outputDir: 'build', defaultFormat: 'svg' })).toEqual({
      outputPath: join('build', 'shop.svg'),
      format: 'svg',
    });
  });

  it('takes the format from the output path extension', () => {
    expect(resolveOutput('Shop', { outputPath: 'x/shop.pdf', defaultFormat: 'svg' })).toEqual({
      outputPath: 'x/shop.pdf',
      format: 'pdf',
    });
  });

  it('lets an explicit format win over the extension', () => {
    expect(resolveOutput('Shop', { outputPath: 'shop.pdf', format: 'png' })).toEqual({
      outputPath: 'shop.pdf',
      format: 'png',
    });
  });

  it('uses the default format when the path has no known extension', () => {
    expect(resolveOutput('Shop', { outputPath: 'shop', defaultFormat: 'svg' })).toEqual({
      outputPath: 'shop',
      format: 'svg',
    });
  });
});

describe('renderGraph', () => {
  it('hands the DOT source and request to the renderer', async () => {
    const renderer = new RecordingRenderer();
    const g = openGraph('Empty');
    const result = await renderGraph(g.close(), { renderer, outputPath: 'empty.svg' });

    expect(result.outputPath).toBe('empty.svg');
    expect(result.format).toBe('svg');
    expect(renderer.calls).toHaveLength(1);
    expect(renderer.calls[0].request).toEqual({ format: 'svg', outputPath: 'empty.svg' });
    expect(renderer.calls[0].source).toBe(result.source);
    expect(result.source.startsWith('digraph "Empty" {\n')).toBe(true);
  });

  it('reports progress, including unknown kinds', async () => {
    const messages: string[] = [];
    const g = openGraph('Shop');
    g.createNode('a', 'mainframe');
    g.createNode('b', 'compute');

    await renderGraph(g.close(), {
      renderer: new RecordingRenderer(),
      outputDir: 'out',
      onProgress: (message) => messages.push(message),
    });

    expect(messages).toEqual([
      'Unknown kind "mainframe", using the generic glyph',
      'Serializing graph to DOT...',
      `Rendering PNG to ${join('out', 'shop.png')}...`,
      'Render completed successfully',
    ]);
  });

  it('propagates backend errors', async () => {
    const messages: string[] = [];
    await expect(
      renderGraph(openGraph('T').close(), {
        renderer: new FailingRenderer(),
        onProgress: (message) => messages.push(message),
      }),
    ).rejects.toBeInstanceOf(RenderBackendError);
    expect(messages).not.toContain('Render completed successfully');
  });
});

describe('diagram', () => {
  it('renders a single self-loop edge', async () => {
    const renderer = new RecordingRenderer();
    const result = await diagram('T', { direction: 'top-to-bottom', renderer }, (g) => {
      const n = g.createNode('X', 'compute');
      g.connect(n, n);
    });

    const lines = result.source.split('\n');
    expect(lines.filter((line) => line.includes('->'))).toEqual(['  n1 -> n1;']);
    expect(renderer.calls).toHaveLength(1);
  });

  it('renders nothing when the build callback throws', async () => {
    const renderer = new RecordingRenderer();
    await expect(
      diagram('T', { renderer }, (g) => {
        g.openCluster('Half built');
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(renderer.calls).toHaveLength(0);
  });

  it('renders nothing when the build leaves a cluster open', async () => {
    const renderer = new RecordingRenderer();
    await expect(
      diagram('Shop', { renderer }, (g) => {
        g.openCluster('Clients');
      }),
    ).rejects.toThrow('Cannot close graph "Shop" while cluster "Clients" is still open');
    expect(renderer.calls).toHaveLength(0);
  });
});

describe('assemble', () => {
  it('returns the closed graph', () => {
    const graph = assemble('T', { direction: 'right-to-left' }, (g) => {
      g.createNode('a');
    });
    expect(graph.direction).toBe('right-to-left');
    expect(graph.children).toHaveLength(1);
  });
});
