/**
 * Error taxonomy for topodraw
 *
 * Construction errors (ScopeError, UnknownEndpointError) abort graph assembly.
 * RenderBackendError carries the backend's own diagnostics.
 */

export class TopodrawError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An operation needed an open scope, or scopes were closed out of order
 */
export class ScopeError extends TopodrawError {}

/**
 * An edge referenced something that was not created in the same graph
 */
export class UnknownEndpointError extends TopodrawError {
  /** Id (or document reference) of the rejected endpoint */
  readonly reference: string;

  constructor(reference: string, message?: string) {
    super(message ?? `Unknown edge endpoint: ${reference}`);
    this.reference = reference;
  }
}

export interface RenderBackendDetails {
  /** Executable and arguments that were run */
  command: string[];
  /** Exit code, or null when the process never started or was killed */
  exitCode: number | null;
  /** Diagnostic text written by the backend */
  stderr: string;
}

/**
 * The layout engine is missing, failed, timed out or wrote nothing
 */
export class RenderBackendError extends TopodrawError {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, details: RenderBackendDetails) {
    const diagnostics = details.stderr.trim();
    super(diagnostics ? `${message}\n${diagnostics}` : message);
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/**
 * A diagram document failed validation
 */
export class DocumentError extends TopodrawError {
  /** One entry per problem, formatted as `path: message` */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}

export class ConfigError extends TopodrawError {}
