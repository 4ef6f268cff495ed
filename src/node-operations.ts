/**
 * Move/remove primitives for tree nodes. Paths are relative to the root the
 * operations were created with.
 */

import fs from 'fs';
import path from 'path';
import { execFileSync } from 'child_process';
import { logger, errorMessage } from './logger.js';

export interface NodeOperations {
  readonly name: string;
  move(sourcePath: string, destinationPath: string): void;
  remove(targetPath: string): void;
}

/**
 * History-preserving moves through the git CLI
 */
export class GitOperations implements NodeOperations {
  readonly name = 'git';

  constructor(private readonly root: string) {}

  private git(args: string[]): void {
    execFileSync('git', args, { cwd: this.root, stdio: 'pipe' });
  }

  move(sourcePath: string, destinationPath: string): void {
    fs.mkdirSync(path.dirname(path.join(this.root, destinationPath)), { recursive: true });
    this.git(['mv', sourcePath, destinationPath]);
  }

  remove(targetPath: string): void {
    this.git(['rm', '-rf', '--quiet', targetPath]);
  }
}

export class FilesystemOperations implements NodeOperations {
  readonly name = 'filesystem';

  constructor(private readonly root: string) {}

  move(sourcePath: string, destinationPath: string): void {
    const sourceAbs = path.join(this.root, sourcePath);
    const destinationAbs = path.join(this.root, destinationPath);
    fs.mkdirSync(path.dirname(destinationAbs), { recursive: true });

    if (fs.statSync(sourceAbs).isDirectory()) {
      // copy then delete so an existing destination directory is merged into
      fs.cpSync(sourceAbs, destinationAbs, { recursive: true });
      fs.rmSync(sourceAbs, { recursive: true, force: true });
      return;
    }

    fs.renameSync(sourceAbs, destinationAbs);
  }

  remove(targetPath: string): void {
    fs.rmSync(path.join(this.root, targetPath), { recursive: true, force: true });
  }
}

/**
 * Tries the primary operations first and falls back on any failure. A
 * failure of the fallback propagates to the caller.
 */
export class FallbackOperations implements NodeOperations {
  readonly name: string;

  constructor(
    private readonly primary: NodeOperations,
    private readonly fallback: NodeOperations,
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  move(sourcePath: string, destinationPath: string): void {
    try {
      this.primary.move(sourcePath, destinationPath);
    } catch (error) {
      logger.debug(
        `${this.primary.name} move failed, using ${this.fallback.name}`,
        { sourcePath, error: errorMessage(error) },
        'NodeOperations'
      );
      this.fallback.move(sourcePath, destinationPath);
    }
  }

  remove(targetPath: string): void {
    try {
      this.primary.remove(targetPath);
    } catch (error) {
      logger.debug(
        `${this.primary.name} remove failed, using ${this.fallback.name}`,
        { targetPath, error: errorMessage(error) },
        'NodeOperations'
      );
      this.fallback.remove(targetPath);
    }
  }
}

export function createNodeOperations(root: string, useGit: boolean): NodeOperations {
  const filesystem = new FilesystemOperations(root);
  return useGit ? new FallbackOperations(new GitOperations(root), filesystem) : filesystem;
}
