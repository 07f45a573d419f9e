/**
 * treesync Commands — Diff across elements.
 */

import type { DiffEntry } from '../types/index.js';
import type { Config } from '../config/index.js';
import { DistributedWork } from '../work/index.js';
import { targetElements, type CollectOptions } from './status.js';

export async function diff(config: Config, options: CollectOptions = {}): Promise<DiffEntry[]> {
  const basePath = config.getBasePath();
  const work = new DistributedWork<DiffEntry>(options);
  for (const element of targetElements(config, options.localName)) {
    work.add({
      label: element.localName,
      execute: async () => ({ element, diff: await element.getDiff(basePath) }),
    });
  }
  return work.run();
}
