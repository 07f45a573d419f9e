/**
 * treesync — Error classes.
 *
 * Every failure the engine raises on purpose is a WorkspaceError with a
 * stable code; anything else reaching the CLI is a bug.
 */

export type WorkspaceErrorCode =
  | 'CONFIGURATION'
  | 'SELECTION'
  | 'PREPARATION'
  | 'INSTALL'
  | 'SOURCE'
  | 'VCS';

export class WorkspaceError extends Error {
  readonly code: WorkspaceErrorCode;

  constructor(message: string, code: WorkspaceErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkspaceError';
    this.code = code;
  }
}

/** No sources, an empty aggregation, or invalid settings */
export class ConfigurationError extends WorkspaceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/** A name or path query matched no element */
export class SelectionError extends WorkspaceError {
  constructor(message: string) {
    super(message, 'SELECTION');
    this.name = 'SelectionError';
  }
}

/** Conflict detected during the prepare phase, or abort requested by policy */
export class PreparationError extends WorkspaceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PREPARATION', options);
    this.name = 'PreparationError';
  }
}

/** A work unit failed while materializing a tree */
export class InstallError extends WorkspaceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INSTALL', options);
    this.name = 'InstallError';
  }
}

/** A declaration source could not be located, read or parsed */
export class SourceError extends WorkspaceError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, 'SOURCE', options);
    this.name = 'SourceError';
    this.source = source;
  }
}

/** A backend command exited unsuccessfully */
export class VcsError extends WorkspaceError {
  readonly command: string;
  readonly stderr: string;

  constructor(command: string, stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim();
    super(detail ? `${command} failed: ${detail}` : `${command} failed`, 'VCS', options);
    this.name = 'VcsError';
    this.command = command;
    this.stderr = stderr;
  }
}

export function isWorkspaceError(error: unknown): error is WorkspaceError {
  return error instanceof WorkspaceError;
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
