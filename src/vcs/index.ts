/**
 * treesync VCS — exports.
 */

export type { VcsClient, VcsBackend } from './types.js';
export { STATUS_COLUMNS } from './types.js';
export { execFileRunner, runChecked, formatCommand } from './runner.js';
export type { CommandRunner, CommandResult, CommandOptions } from './runner.js';
export { CommandVcsClient, normalizeUrl } from './base.js';
export { GitClient, createGitBackend } from './git.js';
export { HgClient, createHgBackend } from './hg.js';
export { VcsRegistry, createDefaultRegistry, describeBackend } from './registry.js';
