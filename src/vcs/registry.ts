/**
 * treesync VCS — Backend registry.
 *
 * The table of available backends is built by the caller and handed to the
 * engine; nothing looks backends up from module state.
 */

import type { BackendVersion, ScmType } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import type { VcsBackend } from './types.js';
import type { CommandRunner } from './runner.js';
import { createGitBackend } from './git.js';
import { createHgBackend } from './hg.js';

export class VcsRegistry {
  private readonly table = new Map<ScmType, VcsBackend>();

  constructor(backends: Iterable<VcsBackend> = []) {
    for (const backend of backends) this.register(backend);
  }

  register(backend: VcsBackend): this {
    if (backend.scmType === 'none') {
      throw new ConfigurationError('Cannot register a backend for scm type "none"');
    }
    this.table.set(backend.scmType, backend);
    return this;
  }

  has(scmType: ScmType): boolean {
    return this.table.has(scmType);
  }

  get(scmType: ScmType): VcsBackend {
    const backend = this.table.get(scmType);
    if (!backend) {
      const known = [...this.table.keys()].join(', ') || 'none';
      throw new ConfigurationError(`No backend registered for scm type "${scmType}" (available: ${known})`);
    }
    return backend;
  }

  backends(): VcsBackend[] {
    return [...this.table.values()];
  }
}

/** Registry with the bundled git and hg backends */
export function createDefaultRegistry(runner?: CommandRunner): VcsRegistry {
  return new VcsRegistry([createGitBackend(runner), createHgBackend(runner)]);
}

/** Tool version of one backend; unavailable tools report "not available" */
export async function describeBackend(backend: VcsBackend): Promise<BackendVersion> {
  try {
    const { version = 'unknown', ...details } = await backend.getEnvironmentMetadata();
    return { scmType: backend.scmType, version, details };
  } catch (err) {
    return { scmType: backend.scmType, version: 'not available', details: { error: errorMessage(err) } };
  }
}
