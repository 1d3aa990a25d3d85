/**
 * Render pipeline: finished graph -> DOT -> image file
 *
 * The backend is injected through RenderOptions.renderer; Graphviz is used
 * when none is given.
 */

import mime from 'mime';
import { join } from 'path';
import { DEFAULT_CATALOG, unknownKinds } from './catalog';
import { toDot, type DotOptions } from './dot';
import { GraphvizRenderer } from './renderers/graphviz';
import type { GraphRenderer, OutputFormat } from './renderers/types';
import type { Graph } from './types';

export interface RenderOptions {
  /** Output file path. Default: `<slugified title>.<format>` in outputDir */
  outputPath?: string;

  /** Directory for the default output path. Default: '.' */
  outputDir?: string;

  /** Output format; wins over the output path's extension */
  format?: OutputFormat;

  /** Used when neither format nor the output path's extension decide. Default: 'png' */
  defaultFormat?: OutputFormat;

  /** Render backend. Default: GraphvizRenderer with its defaults */
  renderer?: GraphRenderer;

  /** Serializer options (catalog, fonts) */
  dot?: DotOptions;

  /** Callback for progress messages (optional) */
  onProgress?: (message: string) => void;
}

export interface RenderResult {
  outputPath: string;
  format: OutputFormat;
  /** DOT source handed to the backend */
  source: string;
}

const FORMAT_BY_MIME: Record<string, OutputFormat> = {
  'image/png': 'png',
  'image/svg+xml': 'svg',
  'application/pdf': 'pdf',
  'image/jpeg': 'jpg',
};

/**
 * Output format implied by a file name, or null if the extension names none
 */
export function formatFromPath(path: string): OutputFormat | null {
  const type = mime.getType(path);
  if (!type || !Object.prototype.hasOwnProperty.call(FORMAT_BY_MIME, type)) {
    return null;
  }
  return FORMAT_BY_MIME[type];
}

/**
 * File name stem for a diagram title
 *
 * @example
 * slugify('Online Marketplace Architecture') // => 'online_marketplace_architecture'
 */
export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'diagram';
}

/**
 * Decide output path and format for a diagram
 */
export function resolveOutput(
  title: string,
  options: RenderOptions = {},
): { outputPath: string; format: OutputFormat } {
  const fromPath = options.outputPath ? formatFromPath(options.outputPath) : null;
  const format = options.format ?? fromPath ?? options.defaultFormat ?? 'png';
  const outputPath =
    options.outputPath ??
    join(options.outputDir ?? '.', `${slugify(title)}.${format}`);
  return { outputPath, format };
}

/**
 * Render a finished graph to an image file
 *
 * Steps:
 * 1. Report kinds missing from the catalog (they use the generic glyph)
 * 2. Serialize the graph to DOT
 * 3. Hand the source to the backend, which writes the file atomically
 *
 * @throws RenderBackendError if the backend fails; no file is left behind
 */
export async function renderGraph(
  graph: Graph,
  options: RenderOptions = {},
): Promise<RenderResult> {
  const { onProgress } = options;
  const { outputPath, format } = resolveOutput(graph.title, options);

  for (const kind of unknownKinds(graph, options.dot?.catalog ?? DEFAULT_CATALOG)) {
    onProgress?.(`Unknown kind "${kind}", using the generic glyph`);
  }

  onProgress?.('Serializing graph to DOT...');
  const source = toDot(graph, options.dot);

  const renderer = options.renderer ?? new GraphvizRenderer();
  onProgress?.(`Rendering ${format.toUpperCase()} to ${outputPath}...`);
  await renderer.render(source, { format, outputPath });
  onProgress?.('Render completed successfully');

  return { outputPath, format, source };
}
