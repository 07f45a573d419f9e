/**
 * treesync Config — Declaration sources.
 *
 * A source yields element declarations in order: a manifest file, a
 * directory (its manifest, or the directory itself as a plain element),
 * a manifest served over http(s), or a fixed in-memory list.
 */

import { existsSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';
import type { ElementDeclaration } from '../types/index.js';
import { SourceError } from '../errors/index.js';
import { parseManifest } from './manifest.js';

export interface DeclarationSource {
  /** Shown in errors and used as the declarations' origin */
  describe(): string;
  load(): Promise<ElementDeclaration[]>;
}

export class ManifestFileSource implements DeclarationSource {
  constructor(readonly file: string) {}

  describe(): string {
    return this.file;
  }

  async load(): Promise<ElementDeclaration[]> {
    let text: string;
    try {
      text = await readFile(this.file, 'utf-8');
    } catch (err) {
      throw new SourceError(this.file, 'cannot read manifest', { cause: err });
    }
    return parseManifest(text, this.file);
  }
}

export class DirectorySource implements DeclarationSource {
  /**
   * @param dir - Absolute directory
   * @param localName - Name to declare the directory under when it has no manifest
   * @param manifestName - Manifest file name to look for inside `dir`
   */
  constructor(
    readonly dir: string,
    readonly localName: string,
    readonly manifestName?: string,
  ) {}

  describe(): string {
    return this.manifestFile() ?? this.dir;
  }

  async load(): Promise<ElementDeclaration[]> {
    const manifest = this.manifestFile();
    if (manifest) return new ManifestFileSource(manifest).load();
    return [{ localName: this.localName, path: this.dir, scmType: 'none', origin: this.dir }];
  }

  private manifestFile(): string | null {
    if (!this.manifestName) return null;
    const file = join(this.dir, this.manifestName);
    return existsSync(file) ? file : null;
  }
}

export type FetchLike = (url: string) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export class UrlSource implements DeclarationSource {
  constructor(
    readonly url: string,
    private readonly fetchImpl: FetchLike = (url) => fetch(url),
  ) {}

  describe(): string {
    return this.url;
  }

  async load(): Promise<ElementDeclaration[]> {
    let res: Awaited<ReturnType<FetchLike>>;
    try {
      res = await this.fetchImpl(this.url);
    } catch (err) {
      throw new SourceError(this.url, 'request failed', { cause: err });
    }
    if (!res.ok) {
      throw new SourceError(this.url, `HTTP ${res.status}`);
    }
    return parseManifest(await res.text(), this.url);
  }
}

export class StaticSource implements DeclarationSource {
  constructor(
    private readonly declarations: readonly ElementDeclaration[],
    private readonly description = 'inline declarations',
  ) {}

  describe(): string {
    return this.description;
  }

  async load(): Promise<ElementDeclaration[]> {
    return this.declarations.map(decl => ({ origin: this.description, ...decl }));
  }
}

const URL_PATTERN = /^https?:\/\//i;

/**
 * Map URIs to sources. Relative paths resolve against `basePath`.
 * Throws SourceError for a path that does not exist.
 */
export function resolveSources(
  uris: readonly string[],
  basePath: string,
  manifestName?: string,
): DeclarationSource[] {
  return uris.map(uri => {
    if (URL_PATTERN.test(uri)) return new UrlSource(uri);

    const absolute = resolve(basePath, uri);
    if (!existsSync(absolute)) {
      throw new SourceError(uri, 'no such file or directory');
    }
    if (statSync(absolute).isDirectory()) {
      return new DirectorySource(absolute, relative(basePath, absolute) || '.', manifestName);
    }
    return new ManifestFileSource(absolute);
  });
}
