/**
 * treesync Commands — exports.
 */

export { getConfig, mergeConfig, persistConfig } from './get-config.js';
export type { GetConfigOptions } from './get-config.js';
export { status, alignStatus, targetElements, STATUS_MARKER_WIDTH } from './status.js';
export type { CollectOptions, StatusOptions } from './status.js';
export { diff } from './diff.js';
export { syncWorkspace, installOrUpdate } from './install.js';
export type { InstallOptions } from './install.js';
export { versions } from './versions.js';
