/**
 * What `topodraw <input>` does once commander has parsed the flags
 */

import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { extendCatalog, DEFAULT_CATALOG } from '../core/catalog';
import { loadConfig } from '../core/config';
import { assembleDocument, loadDiagramDocument } from '../core/document';
import { toDot, type DotOptions } from '../core/dot';
import { renderGraph, type RenderResult } from '../core/render';
import { GraphvizRenderer } from '../core/renderers/graphviz';
import { applyFlags, parseFormat } from './options';

/**
 * Load a diagram document and render it
 *
 * @param options - Parsed command line flags
 * @param log - Receives progress messages
 */
export async function run(
  input: string,
  options: Record<string, unknown>,
  log: (message: string) => void,
): Promise<RenderResult> {
  // Load config (file -> defaults -> CLI overrides)
  const config = applyFlags(
    loadConfig(typeof options.config === 'string' ? options.config : undefined),
    options,
  );
  const format =
    typeof options.format === 'string' ? parseFormat(options.format) : undefined;

  log(`Config: ${JSON.stringify(config, null, 2)}`);

  const inputPath = resolve(input);
  log(`Processing: ${inputPath}`);

  const doc = await loadDiagramDocument(inputPath);
  const graph = assembleDocument(doc, { direction: config.graph.direction });

  const dot: DotOptions = {
    catalog: config.kinds ? extendCatalog(config.kinds) : DEFAULT_CATALOG,
    fontName: config.graph.fontName,
    fontSize: config.graph.fontSize,
  };

  // Before rendering, so a failed render still leaves the DOT source
  if (typeof options.emitDot === 'string') {
    await writeFile(options.emitDot, toDot(graph, dot));
    log(`DOT source: ${options.emitDot}`);
  }

  return renderGraph(graph, {
    outputPath:
      typeof options.output === 'string' ? resolve(options.output) : undefined,
    outputDir: resolve(config.render.outputDir),
    format,
    defaultFormat: config.render.format,
    renderer: new GraphvizRenderer({
      dotPath: config.render.dotPath,
      timeoutMs: config.render.timeoutMs,
      additionalArgs: config.render.dotArgs,
    }),
    dot,
    onProgress: log,
  });
}
