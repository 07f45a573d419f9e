/**
 * treesync Workspace — Element selection by local name or path.
 */

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ConfigElement } from '../types/index.js';
import { SelectionError } from '../errors/index.js';

/**
 * Resolve `query` to one element, or null for "all elements" when no query is given.
 *
 * A local name match wins outright (first one). Failing that, the query is
 * compared by real path and the last matching element wins, the same
 * later-overrides-earlier rule the aggregator applies.
 */
export function selectElement<E extends ConfigElement>(
  elements: readonly E[],
  query?: string | null,
): E | null {
  if (query === undefined || query === null) return null;

  const queryPath = realpathOrResolved(query);
  let pathCandidate: E | null = null;
  for (const element of elements) {
    if (element.localName === query) return element;
    if (realpathOrResolved(element.path) === queryPath) {
      pathCandidate = element;
    }
  }

  if (!pathCandidate) {
    throw new SelectionError(`No config element matches: ${query}`);
  }
  return pathCandidate;
}

/** Real path when the target exists, lexically resolved path otherwise */
export function realpathOrResolved(path: string): string {
  const absolute = resolve(path);
  try {
    return realpathSync(absolute);
  } catch {
    return absolute;
  }
}
