import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { aggregate, dedupeDeclarations } from '../src/config/aggregate.js';
import { StaticSource } from '../src/config/sources.js';
import { ConfigurationError } from '../src/errors/index.js';
import { OtherConfigElement, VcsConfigElement } from '../src/workspace/elements.js';
import type { ElementDeclaration } from '../src/types/index.js';

const BASE = '/ws';

function git(localName: string, path: string, version?: string): ElementDeclaration {
  return { localName, path, scmType: 'git', uri: `https://example.com/${localName}.git`, version };
}

// ─── Deduplication ───────────────────────────────────────────────────

describe('dedupeDeclarations', () => {
  it('keeps the later declaration at its own position', () => {
    const result = dedupeDeclarations([git('A', 'a'), git('B', 'b'), git('A2', 'a')], BASE);
    expect(result.map(d => d.localName)).toEqual(['B', 'A2']);
  });

  it('keeps the order of survivors when the duplicate comes first', () => {
    const result = dedupeDeclarations([git('A', 'a'), git('A2', 'a'), git('B', 'b')], BASE);
    expect(result.map(d => d.localName)).toEqual(['A2', 'B']);
  });

  it('compares resolved paths, not spellings', () => {
    const result = dedupeDeclarations(
      [git('one', './lib/core'), git('two', 'lib/core/'), git('three', '/ws/lib/core')],
      BASE,
    );
    expect(result.map(d => d.localName)).toEqual(['three']);
  });

  it('defaults the path to the local name', () => {
    const result = dedupeDeclarations(
      [{ localName: 'core', scmType: 'none' }, git('core2', 'core')],
      BASE,
    );
    expect(result.map(d => d.localName)).toEqual(['core2']);
  });
});

// ─── aggregate ───────────────────────────────────────────────────────

describe('aggregate', () => {
  it('concatenates sources in order and builds elements', async () => {
    const config = await aggregate(
      [
        new StaticSource([git('core', 'core', 'main')], 'first'),
        new StaticSource([{ localName: 'notes', scmType: 'none' }], 'second'),
      ],
      BASE,
      { configFilename: '.treesync.yaml' },
    );

    const [core, notes] = config.getElements();
    expect(core).toBeInstanceOf(VcsConfigElement);
    expect(core.path).toBe(join(BASE, 'core'));
    expect(core.version).toBe('main');
    expect(notes).toBeInstanceOf(OtherConfigElement);
    expect(config.getBasePath()).toBe(BASE);
    expect(config.getConfigFilename()).toBe('.treesync.yaml');
    expect(config.size).toBe(2);
  });

  it('lets a later source override an earlier one', async () => {
    const config = await aggregate(
      [new StaticSource([git('core', 'core', 'main')]), new StaticSource([git('core', 'core', 'dev')])],
      BASE,
    );
    expect(config.getDeclarations()).toEqual([
      { localName: 'core', path: join(BASE, 'core'), scmType: 'git', uri: 'https://example.com/core.git', version: 'dev' },
    ]);
  });

  it('requires a base path', async () => {
    await expect(aggregate([new StaticSource([git('a', 'a')])], '')).rejects.toThrow(
      'Need to provide a basepath for Config.',
    );
  });

  it('requires at least one source', async () => {
    await expect(aggregate([], BASE)).rejects.toThrow('No declaration sources given.');
  });

  it('fails when the sources declare nothing', async () => {
    const run = aggregate([new StaticSource([])], BASE);
    await expect(run).rejects.toBeInstanceOf(ConfigurationError);
    await expect(run).rejects.toThrow('No config elements found in inline declarations');
  });

  it('rejects a version-controlled declaration without a uri', async () => {
    await expect(
      aggregate([new StaticSource([{ localName: 'core', scmType: 'git' }], 'manual')], BASE),
    ).rejects.toThrow('Element "core" (manual) has scm type git but no uri');
  });

  it('rejects a backend that is not registered', async () => {
    await expect(
      aggregate([new StaticSource([{ localName: 'old', scmType: 'svn', uri: 'svn://example.com/old' }])], BASE),
    ).rejects.toThrow('No backend registered for scm type "svn" (available: git, hg)');
  });
});
