/**
 * treesync Commands — Tool versions of the registered backends.
 */

import type { BackendVersion } from '../types/index.js';
import { describeBackend, type VcsRegistry } from '../vcs/index.js';
import { distribute } from '../work/index.js';

export async function versions(registry: VcsRegistry): Promise<BackendVersion[]> {
  return distribute(registry.backends(), describeBackend);
}
