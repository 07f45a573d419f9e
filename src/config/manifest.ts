/**
 * treesync Config — Manifest (YAML) parsing and serialization.
 *
 * A manifest is a YAML list; each entry has exactly one key naming the
 * backend (`git`, `svn`, `hg`, `bzr`, `tar`, or `other` for a plain
 * directory) and a body:
 *
 *   - git:
 *       local-name: core
 *       uri: https://example.com/core.git
 *       version: main
 *   - other:
 *       local-name: notes
 */

import { writeFile } from 'node:fs/promises';
import { relative } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { ElementDeclaration, ScmType } from '../types/index.js';
import { SourceError } from '../errors/index.js';

const MANIFEST_KEYS: Record<string, ScmType> = {
  git: 'git',
  svn: 'svn',
  hg: 'hg',
  bzr: 'bzr',
  tar: 'tar',
  other: 'none',
};

const EntryBodySchema = z.object({
  'local-name': z.string().min(1),
  path: z.string().min(1).optional(),
  uri: z.string().min(1).optional(),
  version: z.union([z.string(), z.number()]).transform(String).optional(),
});

const ManifestSchema = z.array(z.record(z.string(), EntryBodySchema)).nullable();

type EntryBody = z.infer<typeof EntryBodySchema>;

/** Parse manifest text; `origin` names the source in errors and on each declaration */
export function parseManifest(text: string, origin: string): ElementDeclaration[] {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new SourceError(origin, `invalid YAML: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SourceError(origin, `invalid manifest${where}: ${issue?.message ?? 'unexpected shape'}`);
  }

  return (parsed.data ?? []).map((entry, index) => toDeclaration(entry, index, origin));
}

function toDeclaration(entry: Record<string, EntryBody>, index: number, origin: string): ElementDeclaration {
  const keys = Object.keys(entry);
  if (keys.length !== 1) {
    throw new SourceError(origin, `entry ${index} must have exactly one backend key, found ${keys.length}`);
  }
  const key = keys[0];
  const scmType = MANIFEST_KEYS[key];
  if (!scmType) {
    throw new SourceError(origin, `entry ${index} has unknown backend "${key}"`);
  }
  const body = entry[key];
  if (scmType !== 'none' && !body.uri) {
    throw new SourceError(origin, `entry ${index} (${body['local-name']}) is missing "uri"`);
  }
  return {
    localName: body['local-name'],
    scmType,
    origin,
    ...(body.path ? { path: body.path } : {}),
    ...(body.uri ? { uri: body.uri } : {}),
    ...(body.version ? { version: body.version } : {}),
  };
}

// ─── Serialization ───────────────────────────────────────────────────

export interface SerializeOptions {
  /** Paths inside this directory are written relative to it */
  basePath?: string;
  /** Comment block written above the entries */
  header?: string;
}

export function serializeManifest(declarations: readonly ElementDeclaration[], options: SerializeOptions = {}): string {
  const entries = declarations.map(decl => {
    const key = decl.scmType === 'none' ? 'other' : decl.scmType;
    const body: Record<string, string> = { 'local-name': decl.localName };
    const path = decl.path && options.basePath ? relative(options.basePath, decl.path) || '.' : decl.path;
    if (path && path !== decl.localName) body.path = path;
    if (decl.uri) body.uri = decl.uri;
    if (decl.version) body.version = decl.version;
    return { [key]: body };
  });

  const header = options.header
    ? options.header.split('\n').map(line => (line ? `# ${line}` : '#')).join('\n') + '\n'
    : '';
  const body = entries.length > 0 ? YAML.stringify(entries) : '[]\n';
  return header + body;
}

/** Write declarations as a manifest file */
export async function writeManifest(
  filename: string,
  declarations: readonly ElementDeclaration[],
  options: SerializeOptions = {},
): Promise<void> {
  await writeFile(filename, serializeManifest(declarations, options));
}
