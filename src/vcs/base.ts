/**
 * treesync VCS — Shared plumbing for command-line backends.
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import type { ScmType } from '../types/index.js';
import { STATUS_COLUMNS, type VcsClient } from './types.js';
import { execFileRunner, runChecked, type CommandRunner } from './runner.js';

export abstract class CommandVcsClient implements VcsClient {
  abstract readonly scmType: ScmType;
  /** Executable name, e.g. "git" */
  protected abstract readonly binary: string;
  /** Metadata directory marking a tree of this backend, e.g. ".git" */
  protected abstract readonly metadataDir: string;
  /** Separates source and destination of a rename in status output */
  protected readonly renameSeparator: string | null = null;

  constructor(
    readonly path: string,
    protected readonly runner: CommandRunner = execFileRunner,
  ) {}

  abstract getUrl(): Promise<string | null>;
  abstract checkout(uri: string, version?: string): Promise<void>;
  abstract update(version?: string): Promise<void>;
  abstract getStatus(basePath: string, untracked: boolean): Promise<string>;
  abstract getDiff(basePath: string): Promise<string>;
  abstract getVersion(): Promise<string | null>;

  async detectPresence(): Promise<boolean> {
    return existsSync(join(this.path, this.metadataDir));
  }

  urlMatches(actual: string, requested: string): boolean {
    return normalizeUrl(actual) === normalizeUrl(requested);
  }

  /** Run inside the tree; throws VcsError on a non-zero exit */
  protected run(args: readonly string[], cwd: string = this.path): Promise<string> {
    return runChecked(this.runner, this.binary, args, { cwd });
  }

  /** Run inside the tree; null on a non-zero exit */
  protected async query(args: readonly string[]): Promise<string | null> {
    const result = await this.runner(this.binary, args, { cwd: this.path });
    if (result.exitCode !== 0) return null;
    const out = result.stdout.trim();
    return out === '' ? null : out;
  }

  protected async ensureParentDir(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
  }

  /** Path of this tree as seen from `basePath`, '' when they coincide */
  protected relativeTo(basePath: string): string {
    return relative(basePath, this.path);
  }

  /** Prefix the path part of every status line with the tree's relative path */
  protected rebaseStatus(output: string, basePath: string): string {
    const rel = this.relativeTo(basePath);
    const width = STATUS_COLUMNS[this.scmType] ?? 0;
    const separator = this.renameSeparator;
    return output
      .split('\n')
      .filter(line => line.trim() !== '')
      .map(line => {
        if (!rel) return line + '\n';
        const files = line.slice(width);
        const paths = separator ? files.split(separator) : [files];
        return line.slice(0, width) + paths.map(path => prefixPath(rel, path)).join(separator ?? '') + '\n';
      })
      .join('');
  }
}

/** `rel/path`, keeping a C-quoted path ("a b.txt") quoted as a whole */
function prefixPath(rel: string, path: string): string {
  if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
    return `"${join(rel, path.slice(1, -1))}"`;
  }
  return join(rel, path);
}

/** Compare remotes ignoring trailing slashes and a trailing ".git" */
export function normalizeUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').replace(/\.git$/, '');
}
