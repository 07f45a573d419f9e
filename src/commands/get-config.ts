/**
 * treesync Commands — Building and persisting a Config.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { aggregate, resolveSources, writeManifest, type AggregateOptions, type Config } from '../config/index.js';

export type GetConfigOptions = Omit<AggregateOptions, 'configFilename'>;

/**
 * Create the Config every other command works on.
 *
 * Each URI may be a manifest file, a directory or an http(s) URL. A
 * directory is searched for `configFilename`; without one it is declared as
 * a plain element. With no URIs, `<basePath>/<configFilename>` is used.
 * Duplicate paths keep the last declaration.
 */
export async function getConfig(
  basePath: string,
  uris?: readonly string[],
  configFilename?: string,
  options: GetConfigOptions = {},
): Promise<Config> {
  if (!basePath) {
    throw new ConfigurationError('Need to provide a basepath for Config.');
  }

  let sourceUris = uris && uris.length > 0 ? uris : undefined;
  if (!sourceUris && configFilename) {
    sourceUris = [join(basePath, configFilename)];
  }
  if (!sourceUris) {
    throw new ConfigurationError('no source config file found!');
  }

  const sources = resolveSources(sourceUris, basePath, configFilename);
  return aggregate(sources, basePath, { ...options, configFilename });
}

/**
 * Config from the workspace manifest (when it exists) followed by `uris`,
 * so later declarations override the manifest's.
 */
export async function mergeConfig(
  basePath: string,
  configFilename: string,
  uris: readonly string[],
  options: GetConfigOptions = {},
): Promise<Config> {
  const manifest = join(basePath, configFilename);
  const all = existsSync(manifest) ? [manifest, ...uris] : [...uris];
  return getConfig(basePath, all, configFilename, options);
}

/** Write the config back as a manifest */
export async function persistConfig(config: Config, filename: string, header?: string): Promise<void> {
  await writeManifest(filename, config.getDeclarations(), { basePath: config.getBasePath(), header });
}
