/**
 * treesync Workspace — Discovery of trees on disk that the config does not declare.
 */

import fg from 'fast-glob';
import { dirname, relative, sep } from 'node:path';
import type { ConfigElement, ScmType } from '../types/index.js';

const METADATA_DIRS: Record<string, ScmType> = {
  '.git': 'git',
  '.hg': 'hg',
  '.svn': 'svn',
  '.bzr': 'bzr',
};

const DEFAULT_EXCLUDE = ['**/node_modules/**'];

export interface UndeclaredTree {
  /** Absolute path of the tree */
  path: string;
  /** Path relative to the workspace base */
  relativePath: string;
  scmType: ScmType;
}

export interface DiscoverOptions {
  /** Directory levels to descend below the base path */
  depth?: number;
  exclude?: string[];
}

/**
 * Version-controlled trees below `basePath` that are neither declared nor
 * nested inside a declared element.
 */
export async function findUndeclaredTrees(
  basePath: string,
  elements: readonly ConfigElement[],
  options: DiscoverOptions = {},
): Promise<UndeclaredTree[]> {
  const { depth = 3, exclude = DEFAULT_EXCLUDE } = options;
  const patterns = Object.keys(METADATA_DIRS).map(dir => `**/${dir}`);
  const found = await fg(patterns, {
    cwd: basePath,
    ignore: exclude,
    absolute: true,
    dot: true,
    onlyFiles: false,
    deep: depth + 1,
  });

  const declared = elements.map(element => element.path);
  const covered = (path: string) =>
    declared.some(root => path === root || path.startsWith(root + sep));

  const trees: UndeclaredTree[] = [];
  for (const metadata of found) {
    const path = dirname(metadata);
    if (path === basePath || covered(path)) continue;
    const name = metadata.slice(path.length + 1);
    trees.push({ path, relativePath: relative(basePath, path), scmType: METADATA_DIRS[name] ?? 'none' });
  }
  return trees.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}
