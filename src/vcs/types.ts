/**
 * treesync VCS — Backend client contract.
 */

import type { ScmType } from '../types/index.js';

/** Operations one backend performs on one tree */
export interface VcsClient {
  readonly scmType: ScmType;
  /** Absolute path of the tree this client manages */
  readonly path: string;

  /** Whether `path` holds a tree managed by this backend */
  detectPresence(): Promise<boolean>;
  /** Remote the tree was checked out from, or null when unknown */
  getUrl(): Promise<string | null>;
  /** Whether two remote locations denote the same repository */
  urlMatches(actual: string, requested: string): boolean;
  checkout(uri: string, version?: string): Promise<void>;
  update(version?: string): Promise<void>;
  /** Status lines with paths relative to `basePath`; empty string when clean */
  getStatus(basePath: string, untracked: boolean): Promise<string>;
  /** Diff with paths relative to `basePath`; empty string when clean */
  getDiff(basePath: string): Promise<string>;
  /** Identifier of the checked-out revision */
  getVersion(): Promise<string | null>;
}

/** Factory and metadata for one backend, as held by the registry */
export interface VcsBackend {
  readonly scmType: ScmType;
  createClient(path: string): VcsClient;
  /** Tool version and anything else worth reporting */
  getEnvironmentMetadata(): Promise<Record<string, string>>;
}

/**
 * Width of the change marker each backend prints at the start of a status
 * line. Null where the backend's output is not realigned.
 */
export const STATUS_COLUMNS: Record<ScmType, number | null> = {
  git: 3,
  hg: 2,
  bzr: 4,
  svn: null,
  tar: null,
  none: null,
};
