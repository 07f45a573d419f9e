/**
 * treesync Workspace — Element construction from declarations.
 */

import { resolve } from 'node:path';
import type { ConfigElement, ElementDeclaration } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { VcsRegistry } from '../vcs/index.js';
import { OtherConfigElement, VcsConfigElement } from './elements.js';

export type ElementFactory = (declaration: ElementDeclaration, basePath: string) => ConfigElement;

/** Absolute path a declaration refers to */
export function resolveDeclarationPath(declaration: ElementDeclaration, basePath: string): string {
  return resolve(basePath, declaration.path ?? declaration.localName);
}

/** Factory that builds VCS elements through `registry` */
export function createElementFactory(registry: VcsRegistry): ElementFactory {
  return (declaration, basePath) => {
    const path = resolveDeclarationPath(declaration, basePath);
    if (declaration.scmType === 'none') {
      return new OtherConfigElement(declaration.localName, path);
    }
    if (!declaration.uri) {
      const origin = declaration.origin ? ` (${declaration.origin})` : '';
      throw new ConfigurationError(
        `Element "${declaration.localName}"${origin} has scm type ${declaration.scmType} but no uri`,
      );
    }
    const client = registry.get(declaration.scmType).createClient(path);
    return new VcsConfigElement(
      { localName: declaration.localName, path, uri: declaration.uri, version: declaration.version },
      client,
    );
  };
}
