/**
 * treesync Workspace — exports.
 */

export { OtherConfigElement, VcsConfigElement, backupTarget } from './elements.js';
export type { VcsElementOptions, BackupTargetOptions } from './elements.js';
export { createElementFactory, resolveDeclarationPath } from './factory.js';
export type { ElementFactory } from './factory.js';
export { selectElement, realpathOrResolved } from './select.js';
export { findUndeclaredTrees } from './discover.js';
export type { UndeclaredTree, DiscoverOptions } from './discover.js';
