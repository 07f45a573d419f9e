/**
 * treesync Config — exports.
 */

export { Config, aggregate, dedupeDeclarations } from './aggregate.js';
export type { AggregateOptions } from './aggregate.js';
export {
  ManifestFileSource,
  DirectorySource,
  UrlSource,
  StaticSource,
  resolveSources,
} from './sources.js';
export type { DeclarationSource, FetchLike } from './sources.js';
export { parseManifest, serializeManifest, writeManifest } from './manifest.js';
export type { SerializeOptions } from './manifest.js';
export {
  DEFAULT_MANIFEST,
  DEFAULT_SETTINGS,
  SavedSettingsSchema,
  resolveSettings,
  describeSettingsSource,
  settingsFromEnv,
  projectSettingsPath,
  globalSettingsPath,
  loadProjectSettings,
  loadGlobalSettings,
  saveProjectSettings,
  saveGlobalSettings,
} from './settings.js';
export type { Settings, SavedSettings, SettingsKey, ResolveSettingsOptions } from './settings.js';
