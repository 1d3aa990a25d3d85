/**
 * Configuration for topodraw
 * Shared between the CLI and programmatic callers
 */

import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { Direction, KindGlyph } from './types';
import type { OutputFormat } from './renderers/types';

export interface TopodrawConfig {
  // Render backend
  render: {
    dotPath: string; // Path to dot if not in PATH
    format: OutputFormat; // Used when neither flag nor output extension decides
    outputDir: string; // Where default-named images go
    timeoutMs: number; // 0 = no timeout
    dotArgs?: string[]; // Extra dot arguments
  };

  // Diagram defaults
  graph: {
    direction: Direction;
    fontName: string;
    fontSize: number;
  };

  // Kind catalog additions or replacements
  kinds?: Record<string, KindGlyph>;
}

export const DEFAULT_CONFIG: TopodrawConfig = {
  render: {
    dotPath: 'dot',
    format: 'png',
    outputDir: '.',
    timeoutMs: 30000,
  },
  graph: {
    direction: 'top-to-bottom',
    fontName: 'Sans-Serif',
    fontSize: 13,
  },
};

const GlyphSchema = z.object({
  shape: z.string(),
  fillcolor: z.string(),
  fontcolor: z.string(),
});

/** Shape of a config file: every key optional, unknown keys rejected */
const ConfigFileSchema = z
  .object({
    render: z
      .object({
        dotPath: z.string().min(1),
        format: z.enum(['png', 'svg', 'pdf', 'jpg']),
        outputDir: z.string(),
        timeoutMs: z.number().int().nonnegative(),
        dotArgs: z.array(z.string()),
      })
      .strict()
      .partial(),
    graph: z
      .object({
        direction: z.enum([
          'top-to-bottom',
          'left-to-right',
          'bottom-to-top',
          'right-to-left',
        ]),
        fontName: z.string(),
        fontSize: z.number().positive(),
      })
      .strict()
      .partial(),
    kinds: z.record(GlyphSchema),
  })
  .strict()
  .partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Merge a validated config file over the defaults
 */
function mergeConfig(base: TopodrawConfig, file: ConfigFile): TopodrawConfig {
  const merged: TopodrawConfig = {
    render: { ...base.render, ...file.render },
    graph: { ...base.graph, ...file.graph },
  };
  if (base.kinds || file.kinds) {
    merged.kinds = { ...base.kinds, ...file.kinds };
  }
  return merged;
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError listing every invalid key
 */
export function parseConfig(content: string, source: string): TopodrawConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    throw new ConfigError(
      `Invalid JSON in ${source}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config in ${source}: ${issues.join('; ')}`);
  }

  return mergeConfig(DEFAULT_CONFIG, result.data);
}

/**
 * Load config from file, merging with defaults
 *
 * An explicitly named file must exist and be valid. A file found at a
 * default location that cannot be used is reported and ignored.
 */
export function loadConfig(configPath?: string): TopodrawConfig {
  const defaultPaths = [
    'topodraw.config.json',
    '.topodraw.json',
    'topodraw.json',
  ];

  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return parseConfig(readFileSync(configPath, 'utf-8'), configPath);
  }

  const configFile = defaultPaths.find((path) => existsSync(path));
  if (!configFile) {
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  try {
    return parseConfig(readFileSync(configFile, 'utf-8'), configFile);
  } catch (e) {
    console.warn(`Warning: Failed to load config from ${configFile}:`, e);
    return mergeConfig(DEFAULT_CONFIG, {});
  }
}
