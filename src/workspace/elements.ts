/**
 * treesync Workspace — Config elements.
 *
 * A VcsConfigElement decides how its tree must change (prepareInstall) and
 * carries the change out (install) through its VCS client. An
 * OtherConfigElement is a plain directory the workspace only knows about.
 */

import { existsSync } from 'node:fs';
import { cp, mkdir, rename, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type {
  ConfigElement,
  ConflictChoice,
  ElementDeclaration,
  PreparationReport,
  PrepareInstallOptions,
  ScmType,
} from '../types/index.js';
import { createPreparationReport } from '../types/index.js';
import { InstallError, PreparationError, errorMessage } from '../errors/index.js';
import type { VcsClient } from '../vcs/index.js';

// ─── Plain directories ───────────────────────────────────────────────

export class OtherConfigElement implements ConfigElement {
  readonly scmType: ScmType = 'none';

  constructor(
    readonly localName: string,
    readonly path: string,
  ) {}

  isVcsElement(): boolean {
    return false;
  }

  async getStatus(): Promise<string | null> {
    return null;
  }

  async getDiff(): Promise<string | null> {
    return null;
  }

  async prepareInstall(): Promise<PreparationReport | null> {
    return null;
  }

  async install(): Promise<void> {}

  async getVersion(): Promise<string | null> {
    return null;
  }

  toDeclaration(): ElementDeclaration {
    return { localName: this.localName, path: this.path, scmType: 'none' };
  }
}

// ─── Version-controlled trees ────────────────────────────────────────

export interface VcsElementOptions {
  localName: string;
  path: string;
  uri: string;
  version?: string;
}

export class VcsConfigElement implements ConfigElement {
  readonly localName: string;
  readonly path: string;
  readonly uri: string;
  readonly version?: string;

  constructor(options: VcsElementOptions, private readonly client: VcsClient) {
    this.localName = options.localName;
    this.path = options.path;
    this.uri = options.uri;
    this.version = options.version;
  }

  get scmType(): ScmType {
    return this.client.scmType;
  }

  isVcsElement(): boolean {
    return true;
  }

  async getStatus(basePath: string, untracked: boolean): Promise<string | null> {
    if (!(await this.client.detectPresence())) return null;
    return this.client.getStatus(basePath, untracked);
  }

  async getDiff(basePath: string): Promise<string | null> {
    if (!(await this.client.detectPresence())) return null;
    return this.client.getDiff(basePath);
  }

  async getVersion(): Promise<string | null> {
    if (!(await this.client.detectPresence())) return null;
    return this.client.getVersion();
  }

  /**
   * Compare the tree on disk with the declaration.
   *
   * No tree → fresh checkout. A matching tree → update in place. Anything
   * else is a conflict resolved by `mode` (or the prompter), except in robust
   * mode where a conflict fails this element immediately.
   */
  async prepareInstall(options: PrepareInstallOptions): Promise<PreparationReport> {
    const present = await this.client.detectPresence();
    if (!present && !existsSync(this.path)) {
      return createPreparationReport(this);
    }

    const conflict = present
      ? await this.findUrlConflict()
      : `Failed to detect ${this.scmType} presence at ${this.path}.`;
    if (conflict === null) {
      return createPreparationReport(this, { checkout: false });
    }

    if (options.robust) {
      throw new PreparationError(`Update Failed of ${this.path}: ${conflict}`);
    }

    const mode = await this.resolveMode(options, conflict);
    switch (mode) {
      case 'backup': {
        let backupDir = options.backupPath;
        if (backupDir === undefined) {
          if (!options.prompter) {
            throw new PreparationError(`${conflict} (backup requested but no backup directory given)`);
          }
          backupDir = await options.prompter.askBackupPath();
        }
        const claimed = options.claimedBackupTargets ?? new Set<string>();
        const backupPath = backupTarget(backupDir, this.localName, { claimed });
        claimed.add(backupPath);
        return createPreparationReport(this, { backup: true, backupPath });
      }
      case 'abort':
        return createPreparationReport(this, { abort: true, error: conflict });
      case 'skip':
        return createPreparationReport(this, { skip: true, error: conflict });
      case 'delete':
        return createPreparationReport(this, { backup: false });
    }
  }

  async install(report: PreparationReport): Promise<void> {
    if (!report.checkout) {
      try {
        await this.client.update(this.version);
      } catch (err) {
        throw new InstallError(`[${this.localName}] Update failed of ${this.path}: ${errorMessage(err)}`, { cause: err });
      }
      return;
    }

    if (existsSync(this.path)) {
      if (report.backup) {
        await this.backup(report.backupPath);
      } else {
        await rm(this.path, { recursive: true, force: true });
      }
    }

    try {
      await this.client.checkout(this.uri, this.version);
    } catch (err) {
      throw new InstallError(
        `[${this.localName}] Checkout of ${this.uri} version ${this.version ?? 'default'} into ${this.path} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  toDeclaration(): ElementDeclaration {
    return {
      localName: this.localName,
      path: this.path,
      scmType: this.scmType,
      uri: this.uri,
      ...(this.version ? { version: this.version } : {}),
    };
  }

  private async resolveMode(options: PrepareInstallOptions, conflict: string): Promise<ConflictChoice> {
    if (options.mode !== 'prompt') return options.mode;
    if (!options.prompter) {
      throw new PreparationError(`${conflict} (no prompter available to resolve it)`);
    }
    return options.prompter.chooseConflictResolution(
      `Prepare updating ${this.uri} (version ${this.version ?? 'default'}) to ${this.path}: ${conflict}`,
      true,
    );
  }

  /** Null when the checked-out remote is the requested one, else the reason */
  private async findUrlConflict(): Promise<string | null> {
    const current = await this.client.getUrl();
    if (current && this.client.urlMatches(current, this.uri)) return null;
    return `Url ${current ?? '(none)'} does not match ${this.uri} requested.`;
  }

  /** Move the tree to the target chosen while preparing */
  private async backup(target: string | undefined): Promise<void> {
    if (target === undefined) {
      throw new InstallError(`[${this.localName}] Cannot install ${this.path}: backup disabled.`);
    }
    await mkdir(dirname(target), { recursive: true });
    await moveTree(this.path, target);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

export interface BackupTargetOptions {
  /** Targets already taken in this run, in addition to those on disk */
  claimed?: ReadonlySet<string>;
  now?: Date;
}

/**
 * Where a tree named `localName` is backed up inside `backupDir`:
 * `<backupDir>/<localName>`, else with a timestamp suffix, else with a
 * counter after the timestamp.
 */
export function backupTarget(backupDir: string, localName: string, options: BackupTargetOptions = {}): string {
  const { claimed = new Set<string>(), now = new Date() } = options;
  const taken = (path: string) => claimed.has(path) || existsSync(path);

  const target = join(backupDir, localName);
  if (!taken(target)) return target;

  const stamped = `${target}_${timestamp(now)}`;
  let candidate = stamped;
  for (let n = 2; taken(candidate); n++) {
    candidate = `${stamped}_${n}`;
  }
  return candidate;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return [
    date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate()),
    pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds()),
  ].join('-');
}

async function moveTree(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    // rename cannot cross filesystems
    if (!isErrno(err, 'EXDEV')) throw err;
    await cp(from, to, { recursive: true, preserveTimestamps: true });
    await rm(from, { recursive: true, force: true });
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
