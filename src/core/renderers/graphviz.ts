/**
 * Graphviz renderer using the `dot` executable
 *
 * Requires: Graphviz (https://graphviz.org) with `dot` in PATH, or an
 * explicit dotPath.
 */

import { spawn } from 'child_process';
import { mkdir, rename, stat, unlink } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { RenderBackendError } from '../errors';
import type { GraphRenderer, RenderRequest } from './types';

export interface GraphvizRendererOptions {
  /** Path to dot executable. Default: 'dot' (assumes in PATH) */
  dotPath?: string;
  /** Kill the backend after this many milliseconds; 0 disables. Default: 30000 */
  timeoutMs?: number;
  /** Extra arguments passed to dot before the output options */
  additionalArgs?: string[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Delete a file, treating "already gone" as success
 */
async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw error;
  }
}

/**
 * Temporary path beside the target, so the final rename stays on one
 * filesystem
 */
export function temporaryPathFor(outputPath: string): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 8);
  return join(
    dirname(outputPath),
    `.${basename(outputPath)}.${timestamp}-${random}.tmp`,
  );
}

/**
 * Graphviz renderer. Writes to a temporary file and moves it into place
 * only after dot succeeded.
 */
export class GraphvizRenderer implements GraphRenderer {
  private dotPath: string;
  private timeoutMs: number;
  private additionalArgs: string[];

  constructor(options: GraphvizRendererOptions = {}) {
    this.dotPath = options.dotPath || 'dot';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.additionalArgs = options.additionalArgs ?? [];
  }

  async render(source: string, request: RenderRequest): Promise<void> {
    const { format, outputPath } = request;
    const tmpOutput = temporaryPathFor(outputPath);
    const args = [...this.additionalArgs, `-T${format}`, '-o', tmpOutput];

    await mkdir(dirname(outputPath), { recursive: true });

    try {
      await this.run(source, args);
      await this.assertWritten(tmpOutput, args);
      await rename(tmpOutput, outputPath);
    } catch (error) {
      await removeIfPresent(tmpOutput);
      throw error;
    }
  }

  /**
   * Run dot with the DOT source on stdin
   */
  private run(source: string, args: string[]): Promise<void> {
    const command = [this.dotPath, ...args];

    return new Promise<void>((resolve, reject) => {
      const errorChunks: Buffer[] = [];
      let timer: NodeJS.Timeout | undefined;
      let settled = false;

      const stderr = () => Buffer.concat(errorChunks).toString();
      const finish = (error?: RenderBackendError) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const proc = spawn(this.dotPath, args);

      proc.stderr.on('data', (chunk: Buffer) => errorChunks.push(chunk));

      proc.on('error', (err: NodeJS.ErrnoException) => {
        const message =
          err.code === 'ENOENT'
            ? `Graphviz executable not found: ${this.dotPath}`
            : `Failed to start Graphviz: ${err.message}`;
        finish(
          new RenderBackendError(message, {
            command,
            exitCode: null,
            stderr: stderr(),
          }),
        );
      });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          finish();
          return;
        }
        const status = code === null ? `signal ${signal}` : `code ${code}`;
        finish(
          new RenderBackendError(`Graphviz exited with ${status}`, {
            command,
            exitCode: code,
            stderr: stderr(),
          }),
        );
      });

      // EPIPE means dot exited early; its exit status arrives with 'close'
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EPIPE') return;
        finish(
          new RenderBackendError(
            `Failed to send DOT source to Graphviz: ${err.message}`,
            { command, exitCode: null, stderr: stderr() },
          ),
        );
      });

      if (this.timeoutMs > 0) {
        timer = setTimeout(() => {
          finish(
            new RenderBackendError(
              `Graphviz timed out after ${this.timeoutMs} ms`,
              { command, exitCode: null, stderr: stderr() },
            ),
          );
          proc.kill();
        }, this.timeoutMs);
      }

      proc.stdin.end(source);
    });
  }

  private async assertWritten(path: string, args: string[]): Promise<void> {
    let size = 0;
    try {
      size = (await stat(path)).size;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }
    if (size === 0) {
      throw new RenderBackendError('Graphviz produced no output', {
        command: [this.dotPath, ...args],
        exitCode: 0,
        stderr: '',
      });
    }
  }
}
