/**
 * treesync — Core type definitions.
 *
 * Shared vocabulary for declarations, elements, preparation reports and
 * the results the commands hand back to callers.
 */

// ─── Enums ───────────────────────────────────────────────────────────

/** Closed set of backends an element can be managed by. `none` marks a plain directory. */
export type ScmType = 'git' | 'svn' | 'hg' | 'bzr' | 'tar' | 'none';

export const SCM_TYPES: readonly ScmType[] = ['git', 'svn', 'hg', 'bzr', 'tar', 'none'];

/** Backends that carry a remote uri and can be checked out */
export type VcsScmType = Exclude<ScmType, 'none'>;

/**
 * Conflict policy for trees whose on-disk state disagrees with the declaration.
 *
 *   abort  — stop the whole install
 *   delete — overwrite the local tree
 *   backup — move the local tree into the backup directory, then overwrite
 *   skip   — leave the tree alone and continue with the others
 *   prompt — ask the prompter per conflict
 */
export type InstallMode = 'abort' | 'delete' | 'backup' | 'skip' | 'prompt';

export const INSTALL_MODES: readonly InstallMode[] = ['abort', 'delete', 'backup', 'skip', 'prompt'];

/** What a prompter may answer for one conflict */
export type ConflictChoice = Exclude<InstallMode, 'prompt'>;

// ─── Declarations ────────────────────────────────────────────────────

/** One raw element declaration as yielded by a declaration source */
export interface ElementDeclaration {
  /** Name used to select the element; also the default path */
  localName: string;
  /** Location of the tree; relative paths resolve against the workspace base path */
  path?: string;
  scmType: ScmType;
  /** Remote location; required for every scmType except `none` */
  uri?: string;
  /** Branch, tag or revision to check out */
  version?: string;
  /** Human-readable description of where this declaration came from */
  origin?: string;
}

// ─── Elements ────────────────────────────────────────────────────────

export interface PrepareInstallOptions {
  /** Absolute backup directory, when backups are enabled */
  backupPath?: string;
  mode: InstallMode;
  robust: boolean;
  prompter?: Prompter;
  /**
   * Backup targets already handed out in this run. An element planning a
   * backup claims its target here so no two elements move to the same path.
   */
  claimedBackupTargets?: Set<string>;
}

/**
 * Capability surface the engine needs from one workspace element.
 * The element coordinates its VCS client; the engine never talks to a client directly.
 */
export interface ConfigElement {
  readonly localName: string;
  /** Absolute path of the tree */
  readonly path: string;
  readonly scmType: ScmType;
  readonly uri?: string;
  readonly version?: string;

  isVcsElement(): boolean;
  getStatus(basePath: string, untracked: boolean): Promise<string | null>;
  getDiff(basePath: string): Promise<string | null>;
  /** Returns null when the element needs no install action */
  prepareInstall(options: PrepareInstallOptions): Promise<PreparationReport | null>;
  install(report: PreparationReport): Promise<void>;
  getVersion(): Promise<string | null>;
  toDeclaration(): ElementDeclaration;
}

/** Prepare-phase verdict for one element, consumed by the install phase */
export interface PreparationReport {
  element: ConfigElement;
  /** Fresh checkout (true) or in-place update (false) */
  checkout: boolean;
  /** Move the existing tree away before checking out */
  backup: boolean;
  /** Exact path the existing tree is moved to */
  backupPath?: string;
  abort: boolean;
  skip: boolean;
  error?: string;
}

/** Report for an element that proceeds with default flags */
export function createPreparationReport(
  element: ConfigElement,
  overrides: Partial<Omit<PreparationReport, 'element'>> = {},
): PreparationReport {
  return {
    element,
    checkout: true,
    backup: false,
    abort: false,
    skip: false,
    ...overrides,
  };
}

// ─── Prompting ───────────────────────────────────────────────────────

export interface Prompter {
  chooseConflictResolution(message: string, allowSkip: boolean): Promise<ConflictChoice>;
  askBackupPath(): Promise<string>;
}

// ─── Command results ─────────────────────────────────────────────────

export interface StatusEntry {
  element: ConfigElement;
  status: string | null;
}

export interface DiffEntry {
  element: ConfigElement;
  diff: string | null;
}

export type ElementOutcomeStatus =
  | 'installed'
  | 'updated'
  | 'unchanged'
  | 'skipped'
  | 'aborted'
  | 'failed';

export interface ElementOutcome {
  localName: string;
  path: string;
  status: ElementOutcomeStatus;
  message?: string;
}

/** Structured result of an install/update run */
export interface SyncResult {
  /** True only when every element succeeded or no failure happened */
  success: boolean;
  outcomes: ElementOutcome[];
}

export interface BackendVersion {
  scmType: ScmType;
  version: string;
  details: Record<string, string>;
}
