/**
 * Command line flag parsing, kept apart from the commander program so it can
 * be tested without running it
 */

import type { TopodrawConfig } from '../core/config';
import { ConfigError } from '../core/errors';
import { OUTPUT_FORMATS, type OutputFormat } from '../core/renderers/types';
import { parseDirection, type Direction } from '../core/types';

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    throw new ConfigError(
      `Unknown format "${value}" (expected ${OUTPUT_FORMATS.join(', ')})`,
    );
  }
  return format;
}

/**
 * Milliseconds as a non-negative integer; 0 disables the timeout
 */
export function parseTimeout(value: string): number {
  const timeoutMs = Number(value);
  if (value.trim() === '' || !Number.isInteger(timeoutMs) || timeoutMs < 0) {
    throw new ConfigError(`Invalid timeout "${value}"`);
  }
  return timeoutMs;
}

export function parseDirectionFlag(value: string): Direction {
  const direction = parseDirection(value);
  if (!direction) {
    throw new ConfigError(`Unknown direction "${value}"`);
  }
  return direction;
}

/**
 * Apply --dot, --timeout and --direction over a loaded config.
 * Returns a new config; the input is left as it was.
 */
export function applyFlags(
  config: TopodrawConfig,
  options: Record<string, unknown>,
): TopodrawConfig {
  const render = { ...config.render };
  const graph = { ...config.graph };

  if (typeof options.dot === 'string') render.dotPath = options.dot;
  if (typeof options.timeout === 'string') {
    render.timeoutMs = parseTimeout(options.timeout);
  }
  if (typeof options.direction === 'string') {
    graph.direction = parseDirectionFlag(options.direction);
  }

  return { ...config, render, graph };
}
