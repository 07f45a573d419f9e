/**
 * treesync VCS — Git backend.
 */

import type { VcsBackend } from './types.js';
import { CommandVcsClient } from './base.js';
import { execFileRunner, runChecked, type CommandRunner } from './runner.js';

export class GitClient extends CommandVcsClient {
  readonly scmType = 'git' as const;
  protected readonly binary = 'git';
  protected readonly metadataDir = '.git';
  protected readonly renameSeparator = ' -> ';

  async getUrl(): Promise<string | null> {
    return this.query(['config', '--get', 'remote.origin.url']);
  }

  async checkout(uri: string, version?: string): Promise<void> {
    await this.ensureParentDir();
    await this.run(['clone', '--recursive', uri, this.path], process.cwd());
    if (version) {
      await this.run(['checkout', version]);
    }
  }

  async update(version?: string): Promise<void> {
    await this.run(['fetch', '--tags', 'origin']);
    if (version) {
      await this.run(['checkout', version]);
    }
    // Detached heads (tags, hashes) have nothing to pull
    const branch = await this.query(['symbolic-ref', '-q', '--short', 'HEAD']);
    if (branch) {
      await this.run(['pull', '--ff-only']);
    }
  }

  async getStatus(basePath: string, untracked: boolean): Promise<string> {
    const out = await this.run(['status', '--porcelain', untracked ? '--untracked-files=all' : '--untracked-files=no']);
    return this.rebaseStatus(out, basePath);
  }

  async getDiff(basePath: string): Promise<string> {
    const rel = this.relativeTo(basePath);
    const prefix = rel ? `${rel}/` : '';
    return this.run(['diff', `--src-prefix=a/${prefix}`, `--dst-prefix=b/${prefix}`]);
  }

  async getVersion(): Promise<string | null> {
    return this.query(['rev-parse', 'HEAD']);
  }
}

export function createGitBackend(runner: CommandRunner = execFileRunner): VcsBackend {
  return {
    scmType: 'git',
    createClient: (path) => new GitClient(path, runner),
    async getEnvironmentMetadata() {
      const out = await runChecked(runner, 'git', ['--version']);
      return { version: out.trim().replace(/^git version\s*/, '') };
    },
  };
}
