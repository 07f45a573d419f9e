import { describe, it, expect } from 'vitest';
import { parseManifest, serializeManifest } from '../src/config/manifest.js';
import { SourceError } from '../src/errors/index.js';
import type { ElementDeclaration } from '../src/types/index.js';

// ─── Parsing ─────────────────────────────────────────────────────────

describe('parseManifest', () => {
  it('reads one declaration per entry, in order', () => {
    const text = [
      '- git:',
      '    local-name: core',
      '    uri: https://example.com/core.git',
      '    version: main',
      '- hg:',
      '    local-name: tools',
      '    path: vendor/tools',
      '    uri: https://example.com/tools',
      '- other:',
      '    local-name: notes',
    ].join('\n');

    expect(parseManifest(text, 'ws.yaml')).toEqual([
      { localName: 'core', scmType: 'git', origin: 'ws.yaml', uri: 'https://example.com/core.git', version: 'main' },
      { localName: 'tools', scmType: 'hg', origin: 'ws.yaml', path: 'vendor/tools', uri: 'https://example.com/tools' },
      { localName: 'notes', scmType: 'none', origin: 'ws.yaml' },
    ]);
  });

  it('keeps numeric versions as strings', () => {
    const [decl] = parseManifest('- git: {local-name: core, uri: https://example.com/core.git, version: 2}', 'm.yaml');
    expect(decl.version).toBe('2');
  });

  it('treats an empty document as no declarations', () => {
    expect(parseManifest('', 'm.yaml')).toEqual([]);
    expect(parseManifest('# nothing yet\n', 'm.yaml')).toEqual([]);
  });

  it('requires a uri for version-controlled entries', () => {
    expect(() => parseManifest('- git: {local-name: core}', 'm.yaml')).toThrow(
      'm.yaml: entry 0 (core) is missing "uri"',
    );
  });

  it('rejects unknown backends', () => {
    expect(() => parseManifest('- cvs: {local-name: old}', 'm.yaml')).toThrow(
      'm.yaml: entry 0 has unknown backend "cvs"',
    );
  });

  it('rejects entries with more than one backend key', () => {
    const text = '- git: {local-name: a, uri: https://example.com/a}\n  hg: {local-name: b, uri: https://example.com/b}';
    expect(() => parseManifest(text, 'm.yaml')).toThrow('m.yaml: entry 0 must have exactly one backend key, found 2');
  });

  it('rejects a document that is not a list', () => {
    expect(() => parseManifest('core: main', 'm.yaml')).toThrow(SourceError);
    expect(() => parseManifest('core: main', 'm.yaml')).toThrow(/^m\.yaml: invalid manifest/);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseManifest('- git: [unclosed', 'm.yaml')).toThrow(/^m\.yaml: invalid YAML/);
  });
});

// ─── Serialization ───────────────────────────────────────────────────

describe('serializeManifest', () => {
  const declarations: ElementDeclaration[] = [
    { localName: 'core', path: '/ws/core', scmType: 'git', uri: 'https://example.com/core.git', version: 'main' },
    { localName: 'notes', path: '/ws/docs/notes', scmType: 'none' },
  ];

  it('writes paths relative to the base path and omits the default one', () => {
    const parsed = parseManifest(serializeManifest(declarations, { basePath: '/ws' }), 'out.yaml');
    expect(parsed).toEqual([
      { localName: 'core', scmType: 'git', origin: 'out.yaml', uri: 'https://example.com/core.git', version: 'main' },
      { localName: 'notes', scmType: 'none', origin: 'out.yaml', path: 'docs/notes' },
    ]);
  });

  it('writes plain directories under the "other" key', () => {
    const text = serializeManifest([declarations[1]], { basePath: '/ws' });
    expect(text.startsWith('- other:\n')).toBe(true);
  });

  it('prefixes header lines as comments', () => {
    const text = serializeManifest(declarations, { basePath: '/ws', header: 'written by treesync\n\nedit freely' });
    expect(text.split('\n').slice(0, 3)).toEqual(['# written by treesync', '#', '# edit freely']);
  });

  it('writes an empty list explicitly', () => {
    expect(serializeManifest([])).toBe('[]\n');
  });
});
