import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { insertIndexLink, listTargetEntries, removeIndexLink, renderTargetIndex } from './people-index.js';
import { DEFAULT_LAYOUT } from './types.js';

function writeDocument(root: string, relativePath: string, content = ''): void {
  const absolutePath = join(root, relativePath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  writeFileSync(absolutePath, content);
}

describe('listTargetEntries', () => {
  let target: string;

  beforeEach(() => {
    target = mkdtempSync(join(tmpdir(), 'merge-target-'));
  });

  afterEach(() => {
    rmSync(target, { recursive: true, force: true });
  });

  it('lists containers, their documents and leaves in code-point order', () => {
    writeDocument(target, 'index.md', '# People');
    writeDocument(target, 'JohnSmith/index.md');
    writeDocument(target, 'JohnSmith/Talks.md');
    writeDocument(target, 'AdaLovelace/Notes.md');
    writeDocument(target, 'AdaLovelace/Bio.md');
    writeDocument(target, 'jsmith.md');
    writeDocument(target, 'photo.png');

    expect(listTargetEntries(target, DEFAULT_LAYOUT)).toEqual([
      'AdaLovelace/Bio',
      'AdaLovelace/Notes',
      'JohnSmith/index',
      'jsmith',
    ]);
  });

  it('returns nothing for a missing directory', () => {
    expect(listTargetEntries(join(target, 'missing'), DEFAULT_LAYOUT)).toEqual([]);
  });
});

describe('renderTargetIndex', () => {
  it('renders a hidden toctree with a page count', () => {
    expect(renderTargetIndex('People', ['JohnSmith/index', 'jsmith'])).toBe(
      '# People\n\nThis section contains 2 pages.\n\n```{toctree}\n:maxdepth: 1\n:hidden:\n\nJohnSmith/index\njsmith\n```\n',
    );
  });
});

describe('index link edits', () => {
  const rootIndex = '```{toctree}\nabout\npython/index\npsf/index\n```\n';

  it('inserts the target entry before the anchor line', () => {
    expect(insertIndexLink(rootIndex, 'people/index', 'python/index')).toBe(
      '```{toctree}\nabout\npeople/index\npython/index\npsf/index\n```\n',
    );
  });

  it('does nothing when the entry exists or the anchor is missing', () => {
    expect(insertIndexLink('people/index\npython/index\n', 'people/index', 'python/index')).toBeNull();
    expect(insertIndexLink('about\n', 'people/index', 'python/index')).toBeNull();
  });

  it('removes the namespace people entry', () => {
    expect(removeIndexLink('intro\npeople/index\narchive/index\n', 'people/index')).toBe('intro\narchive/index\n');
    expect(removeIndexLink('intro\n', 'people/index')).toBeNull();
  });
});
