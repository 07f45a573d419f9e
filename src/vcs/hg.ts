/**
 * treesync VCS — Mercurial backend.
 */

import type { VcsBackend } from './types.js';
import { CommandVcsClient } from './base.js';
import { execFileRunner, runChecked, type CommandRunner } from './runner.js';

export class HgClient extends CommandVcsClient {
  readonly scmType = 'hg' as const;
  protected readonly binary = 'hg';
  protected readonly metadataDir = '.hg';

  async getUrl(): Promise<string | null> {
    return this.query(['paths', 'default']);
  }

  async checkout(uri: string, version?: string): Promise<void> {
    await this.ensureParentDir();
    const args = ['clone', '--noninteractive'];
    if (version) args.push('--updaterev', version);
    await this.run([...args, uri, this.path], process.cwd());
  }

  async update(version?: string): Promise<void> {
    await this.run(['pull', '--noninteractive']);
    await this.run(version ? ['update', '--noninteractive', version] : ['update', '--noninteractive']);
  }

  async getStatus(basePath: string, untracked: boolean): Promise<string> {
    // -mard: modified, added, removed, deleted; -u adds unknown files
    const out = await this.run(['status', untracked ? '-mardu' : '-mard']);
    return this.rebaseStatus(out, basePath);
  }

  async getDiff(basePath: string): Promise<string> {
    const out = await this.run(['diff', '--git']);
    const rel = this.relativeTo(basePath);
    if (!rel) return out;
    return out
      .split('\n')
      .map(line => line
        .replace(/^(diff --git a\/)(\S+)( b\/)(\S+)/, `$1${rel}/$2$3${rel}/$4`)
        .replace(/^(--- a\/|\+\+\+ b\/)/, `$1${rel}/`))
      .join('\n');
  }

  async getVersion(): Promise<string | null> {
    return this.query(['identify', '--id']);
  }
}

export function createHgBackend(runner: CommandRunner = execFileRunner): VcsBackend {
  return {
    scmType: 'hg',
    createClient: (path) => new HgClient(path, runner),
    async getEnvironmentMetadata() {
      const out = await runChecked(runner, 'hg', ['--version', '--quiet']);
      const match = out.match(/\(version ([^)]+)\)/);
      return { version: match ? match[1] : out.trim() };
    },
  };
}
