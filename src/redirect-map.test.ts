import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { AppError, logger } from './logger.js';
import { reconcile } from './reconciler.js';
import {
  buildRedirects,
  loadRedirectMapping,
  mergeRedirects,
  resolveChains,
  serializeRedirectMapping,
  writeRedirectMapping,
} from './redirect-map.js';
import type { EntryNode, NamespaceClassification } from './types.js';

function container(namespace: string, key: string, size: number, documents: string[]): EntryNode {
  return { namespace, key, kind: 'container', name: key, path: `${namespace}/people/${key}`, size, documents };
}

function leaf(namespace: string, key: string, size: number): EntryNode {
  return { namespace, key, kind: 'leaf', name: `${key}.md`, path: `${namespace}/people/${key}.md`, size, documents: [] };
}

function classification(
  namespace: string,
  persons: EntryNode[][],
  nonPersons: EntryNode[][] = [],
  relocations: [string, EntryNode[], string][] = [],
): NamespaceClassification {
  return {
    namespace,
    curated: namespace !== 'python',
    persons: new Map(persons.map(nodes => [nodes[0].key, nodes])),
    nonPersons: new Map(nonPersons.map(nodes => [nodes[0].key, nodes])),
    relocations: new Map(relocations.map(([key, nodes, destination]) => [key, { nodes, destination }])),
  };
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof AppError ? error.code : undefined;
  }
  return undefined;
}

describe('buildRedirects', () => {
  it('maps moved, removed, archived and relocated documents', () => {
    const classifications = [
      classification(
        'python',
        [[container('python', 'JohnSmith', 900, ['Projects.md', 'Talks.md', 'index.md'])]],
        [[leaf('python', 'PyGame', 40)]],
      ),
      classification('psf', [[leaf('psf', 'JohnSmith', 200)]]),
      classification('jython', [], [], [['SummerOfCode', [container('jython', 'SummerOfCode', 30, ['index.md'])], 'jython/community']]),
    ];

    const redirects = buildRedirects(classifications, reconcile(classifications));

    expect(Object.fromEntries(redirects)).toEqual({
      'python/people/JohnSmith/index': 'people/JohnSmith/index',
      'python/people/JohnSmith': 'people/JohnSmith',
      'python/people/JohnSmith/Projects': 'people/JohnSmith/Projects',
      'python/people/JohnSmith/Talks': 'people/JohnSmith/Talks',
      'psf/people/JohnSmith': 'people/JohnSmith',
      'python/people/PyGame': 'python/archive/PyGame',
      'jython/people/SummerOfCode/index': 'jython/community/SummerOfCode/index',
      'jython/people/SummerOfCode': 'jython/community/SummerOfCode',
    });
  });

  it('sends documents the winner lacks to its landing page', () => {
    const classifications = [
      classification('python', [[container('python', 'JohnSmith', 900, ['Talks.md', 'index.md'])]]),
      classification('psf', [[container('psf', 'JohnSmith', 100, ['Bio.md', 'index.md'])]]),
    ];

    const redirects = buildRedirects(classifications, reconcile(classifications));

    expect(redirects.get('psf/people/JohnSmith/index')).toBe('people/JohnSmith/index');
    expect(redirects.get('psf/people/JohnSmith/Bio')).toBe('people/JohnSmith/index');
    expect(redirects.get('psf/people/JohnSmith')).toBe('people/JohnSmith');
  });

  it('points a removed dir+file leaf at the surviving container', () => {
    const classifications = [
      classification('python', [[container('python', 'AdaLovelace', 10, ['index.md']), leaf('python', 'AdaLovelace', 99)]]),
    ];

    const redirects = buildRedirects(classifications, reconcile(classifications));

    expect(redirects.get('python/people/AdaLovelace')).toBe('people/AdaLovelace');
    expect(redirects.get('python/people/AdaLovelace/index')).toBe('people/AdaLovelace/index');
  });
});

describe('resolveChains', () => {
  it('collapses every chain to a single hop', () => {
    const mapping = new Map([
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'd'],
    ]);

    const rewritten = resolveChains(mapping);

    expect(Object.fromEntries(mapping)).toEqual({ a: 'd', b: 'd', c: 'd' });
    expect(rewritten).toEqual([
      { source: 'a', from: 'b', to: 'd' },
      { source: 'b', from: 'c', to: 'd' },
    ]);
  });
});

describe('mergeRedirects', () => {
  it('rewrites existing entries that pointed at a moved path', () => {
    const result = mergeRedirects(
      new Map([['OldJohn', 'python/people/JohnSmith']]),
      new Map([['python/people/JohnSmith', 'people/JohnSmith']]),
    );

    expect(Object.fromEntries(result.mapping)).toEqual({
      OldJohn: 'people/JohnSmith',
      'python/people/JohnSmith': 'people/JohnSmith',
    });
    expect(result.added).toBe(1);
    expect(result.rewritten).toEqual([
      { source: 'OldJohn', from: 'python/people/JohnSmith', to: 'people/JohnSmith' },
    ]);
    expect(result.dropped).toEqual([]);
  });

  it('keeps existing entries for a source it already knows', () => {
    const result = mergeRedirects(new Map([['x', 'kept']]), new Map([['x', 'fresh']]));
    expect(result.mapping.get('x')).toBe('kept');
    expect(result.added).toBe(0);
  });

  it('drops an existing entry whose source is a live destination again', () => {
    const result = mergeRedirects(
      new Map([['people/JohnSmith', 'elsewhere']]),
      new Map([['python/people/JohnSmith', 'people/JohnSmith']]),
    );

    expect(result.dropped).toEqual(['people/JohnSmith']);
    expect(Object.fromEntries(result.mapping)).toEqual({ 'python/people/JohnSmith': 'people/JohnSmith' });
  });

  it('drops redirect cycles with a warning', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

    const result = mergeRedirects(new Map([['a', 'b'], ['b', 'a'], ['c', 'd']]), new Map());

    expect(result.dropped).toEqual(['a', 'b']);
    expect(Object.fromEntries(result.mapping)).toEqual({ c: 'd' });
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('returns keys in code-point order and changes nothing on a repeat merge', () => {
    const fresh = new Map([['b', 'z'], ['a', 'z']]);
    const first = mergeRedirects(new Map(), fresh);
    const second = mergeRedirects(first.mapping, new Map());

    expect([...first.mapping.keys()]).toEqual(['a', 'b']);
    expect(second.added).toBe(0);
    expect(second.rewritten).toEqual([]);
    expect(serializeRedirectMapping(second.mapping)).toBe(serializeRedirectMapping(first.mapping));
  });
});

describe('redirect store', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'merge-redirects-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('serializes with two-space indentation and sorted keys', () => {
    const text = serializeRedirectMapping(new Map([['b', '2'], ['a', '1'], ['10', 'x']]));
    expect(text).toBe('{\n  "10": "x",\n  "a": "1",\n  "b": "2"\n}\n');
    expect(serializeRedirectMapping(new Map())).toBe('{}\n');
  });

  it('writes and reads the mapping back', () => {
    const file = join(tmpDir, 'nested', '_redirects.json');
    writeRedirectMapping(file, new Map([['python/people/Ünal', 'people/Ünal']]));

    expect(readFileSync(file, 'utf-8')).toBe('{\n  "python/people/Ünal": "people/Ünal"\n}\n');
    expect(Object.fromEntries(loadRedirectMapping(file))).toEqual({ 'python/people/Ünal': 'people/Ünal' });
  });

  it('treats a missing store as empty', () => {
    expect(loadRedirectMapping(join(tmpDir, 'missing.json')).size).toBe(0);
  });

  it('rejects malformed stores', () => {
    const file = join(tmpDir, '_redirects.json');

    writeFileSync(file, '{ broken');
    expect(errorCode(() => loadRedirectMapping(file))).toBe('REDIRECTS_UNREADABLE');

    writeFileSync(file, '["a", "b"]');
    expect(errorCode(() => loadRedirectMapping(file))).toBe('REDIRECTS_UNREADABLE');

    writeFileSync(file, '{"a": 1}');
    expect(errorCode(() => loadRedirectMapping(file))).toBe('REDIRECTS_UNREADABLE');
  });
});
