/**
 * treesync Config — Aggregation of declaration sources into a Config.
 *
 * Sources are read in order and their declarations concatenated. Two
 * declarations for the same resolved path collapse into the later one, which
 * keeps the position of its own occurrence.
 */

import type { ConfigElement, ElementDeclaration } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { createDefaultRegistry, type VcsRegistry } from '../vcs/index.js';
import { createElementFactory, resolveDeclarationPath, type ElementFactory } from '../workspace/factory.js';
import type { DeclarationSource } from './sources.js';

export class Config {
  constructor(
    private readonly elements: readonly ConfigElement[],
    private readonly basePath: string,
    private readonly configFilename?: string,
  ) {}

  getElements(): readonly ConfigElement[] {
    return this.elements;
  }

  getBasePath(): string {
    return this.basePath;
  }

  /** Manifest name to use when the config is written back */
  getConfigFilename(): string | undefined {
    return this.configFilename;
  }

  getDeclarations(): ElementDeclaration[] {
    return this.elements.map(element => element.toDeclaration());
  }

  get size(): number {
    return this.elements.length;
  }
}

export interface AggregateOptions {
  configFilename?: string;
  /** Backends used to build VCS elements (default: git and hg) */
  registry?: VcsRegistry;
  /** Overrides `registry` entirely */
  factory?: ElementFactory;
}

/**
 * Keep the last declaration per resolved path, ordered by the index of
 * that last occurrence.
 */
export function dedupeDeclarations(
  declarations: readonly ElementDeclaration[],
  basePath: string,
): ElementDeclaration[] {
  const lastIndex = new Map<string, number>();
  declarations.forEach((decl, index) => {
    lastIndex.set(resolveDeclarationPath(decl, basePath), index);
  });
  return declarations.filter((decl, index) => lastIndex.get(resolveDeclarationPath(decl, basePath)) === index);
}

export async function aggregate(
  sources: readonly DeclarationSource[],
  basePath: string,
  options: AggregateOptions = {},
): Promise<Config> {
  if (!basePath) {
    throw new ConfigurationError('Need to provide a basepath for Config.');
  }
  if (sources.length === 0) {
    throw new ConfigurationError('No declaration sources given.');
  }

  const declarations: ElementDeclaration[] = [];
  for (const source of sources) {
    declarations.push(...(await source.load()));
  }

  if (declarations.length === 0) {
    const described = sources.map(s => s.describe()).join(', ');
    throw new ConfigurationError(`No config elements found in ${described}`);
  }

  const factory = options.factory ?? createElementFactory(options.registry ?? createDefaultRegistry());
  const elements = dedupeDeclarations(declarations, basePath).map(decl => factory(decl, basePath));
  return new Config(elements, basePath, options.configFilename);
}
