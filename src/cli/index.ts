#!/usr/bin/env node
/**
 * topodraw CLI
 *
 * Renders a diagram document (JSON) to an image with Graphviz:
 * - nested clusters, usable as edge endpoints
 * - labeled, bidirectional and fan-out edges
 * - PNG, SVG, PDF or JPG output, written atomically
 */

import { program } from 'commander';
import { RenderBackendError } from '../core/errors';
import { OUTPUT_FORMATS } from '../core/renderers/types';
import { run } from './run';

const VERSION = '0.1.0';

program
  .name('topodraw')
  .description('Render a diagram document to an image with Graphviz')
  .version(VERSION)
  .argument('<input>', 'Diagram document (JSON)')
  .option('-o, --output <file>', 'Output file (default: <title>.<format> in the output directory)')
  .option('-c, --config <file>', 'Config file (default: topodraw.config.json)')
  .option('-f, --format <type>', `Output format: ${OUTPUT_FORMATS.join(', ')}`)
  .option('--direction <dir>', 'Layout direction when the document sets none (TB, LR, BT, RL)')
  .option('--dot <path>', 'Path to the Graphviz dot executable')
  .option('--timeout <ms>', 'Kill dot after this many milliseconds (0 = never)')
  .option('--emit-dot <file>', 'Also write the generated DOT source to this file')
  .option('--verbose', 'Verbose output')
  .action(async (input: string, options: Record<string, unknown>) => {
    const verbose = options.verbose === true;
    const log = (message: string) => {
      if (verbose) console.log(message);
    };

    try {
      const result = await run(input, options, log);
      console.log(`Rendered: ${result.outputPath}`);
    } catch (err) {
      if (err instanceof RenderBackendError) {
        console.error('Graphviz failed');
        if (verbose) console.error(`Command: ${err.command.join(' ')}`);
      }
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }
  });

// Parse command line
program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
