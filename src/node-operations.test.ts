import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import {
  FallbackOperations,
  FilesystemOperations,
  createNodeOperations,
  type NodeOperations,
} from './node-operations.js';

function writeDocument(root: string, relativePath: string, content: string): void {
  const absolutePath = join(root, relativePath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  writeFileSync(absolutePath, content);
}

class FailingOperations implements NodeOperations {
  readonly name = 'failing';
  move(): void {
    throw new Error('move unavailable');
  }
  remove(): void {
    throw new Error('remove unavailable');
  }
}

describe('FilesystemOperations', () => {
  let root: string;
  let operations: FilesystemOperations;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'merge-nodeops-'));
    operations = new FilesystemOperations(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('moves a leaf into a directory that does not exist yet', () => {
    writeDocument(root, 'psf/people/jsmith.md', 'hello');

    operations.move('psf/people/jsmith.md', 'people/jsmith.md');

    expect(existsSync(join(root, 'psf/people/jsmith.md'))).toBe(false);
    expect(readFileSync(join(root, 'people/jsmith.md'), 'utf-8')).toBe('hello');
  });

  it('moves a container with its nested documents', () => {
    writeDocument(root, 'python/people/JohnSmith/index.md', 'index');
    writeDocument(root, 'python/people/JohnSmith/talks/2020.md', 'talk');

    operations.move('python/people/JohnSmith', 'people/JohnSmith');

    expect(existsSync(join(root, 'python/people/JohnSmith'))).toBe(false);
    expect(readFileSync(join(root, 'people/JohnSmith/talks/2020.md'), 'utf-8')).toBe('talk');
  });

  it('removes files and directories', () => {
    writeDocument(root, 'psf/people/JohnSmith.md', 'x');
    writeDocument(root, 'psf/people/Other/index.md', 'y');

    operations.remove('psf/people/JohnSmith.md');
    operations.remove('psf/people/Other');

    expect(existsSync(join(root, 'psf/people/JohnSmith.md'))).toBe(false);
    expect(existsSync(join(root, 'psf/people/Other'))).toBe(false);
  });
});

describe('FallbackOperations', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'merge-fallback-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('falls back when the primary fails', () => {
    writeDocument(root, 'a.md', 'a');
    const filesystem = new FilesystemOperations(root);
    const moveSpy = vi.spyOn(filesystem, 'move');
    const operations = new FallbackOperations(new FailingOperations(), filesystem);

    operations.move('a.md', 'b/a.md');

    expect(operations.name).toBe('failing+filesystem');
    expect(moveSpy).toHaveBeenCalledWith('a.md', 'b/a.md');
    expect(existsSync(join(root, 'b/a.md'))).toBe(true);
  });

  it('propagates a failure of the fallback', () => {
    const operations = new FallbackOperations(new FailingOperations(), new FailingOperations());
    expect(() => operations.remove('anything')).toThrow('remove unavailable');
  });
});

describe('createNodeOperations', () => {
  it('uses git with a filesystem fallback unless disabled', () => {
    expect(createNodeOperations('/tmp', true).name).toBe('git+filesystem');
    expect(createNodeOperations('/tmp', false).name).toBe('filesystem');
  });
});
