/**
 * treesync Commands — Status across elements.
 *
 * One work unit per element; results come back in config order.
 */

import type { ConfigElement, ScmType, StatusEntry } from '../types/index.js';
import type { Config } from '../config/index.js';
import { DistributedWork } from '../work/index.js';
import { selectElement } from '../workspace/select.js';
import { STATUS_COLUMNS } from '../vcs/index.js';

/** Width every backend's change marker is padded to */
export const STATUS_MARKER_WIDTH = 8;

/** Re-align the change markers of `status` to STATUS_MARKER_WIDTH columns */
export function alignStatus(status: string | null, scmType: ScmType): string | null {
  const columns = STATUS_COLUMNS[scmType];
  if (columns === null || status === null) return status;
  return splitLines(status)
    .map(line => line.slice(0, columns).padEnd(STATUS_MARKER_WIDTH) + line.slice(columns) + '\n')
    .join('');
}

function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export interface CollectOptions {
  /** Narrow to one element by local name or path */
  localName?: string;
  maxConcurrency?: number;
  signal?: AbortSignal;
}

export interface StatusOptions extends CollectOptions {
  /** Also list files the backend does not track */
  untracked?: boolean;
}

/** The selected element, or every version-controlled element */
export function targetElements(config: Config, localName?: string): readonly ConfigElement[] {
  const elements = config.getElements();
  const selected = selectElement(elements, localName);
  if (selected) return [selected];
  return elements.filter(element => element.isVcsElement());
}

export async function status(config: Config, options: StatusOptions = {}): Promise<StatusEntry[]> {
  const basePath = config.getBasePath();
  const untracked = options.untracked ?? false;
  const work = new DistributedWork<StatusEntry>(options);
  for (const element of targetElements(config, options.localName)) {
    work.add({
      label: element.localName,
      execute: async () => ({
        element,
        status: alignStatus(await element.getStatus(basePath, untracked), element.scmType),
      }),
    });
  }
  return work.run();
}
