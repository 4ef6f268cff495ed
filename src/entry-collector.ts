/**
 * Reads a namespace's people directory into identity-key groups.
 * Read-only: nothing here touches the tree.
 */

import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { logger, errorMessage } from './logger.js';
import { compareCodePoints, joinPosix, stripExtension } from './paths.js';
import { DEFAULT_LAYOUT, type EntryGroup, type EntryNode, type TreeLayout } from './types.js';

function fileSize(absolutePath: string): number {
  try {
    return fs.statSync(absolutePath).size;
  } catch {
    return 0;
  }
}

/**
 * Every document under a container, as sorted container-relative POSIX paths
 */
export function listContainerDocuments(containerAbs: string, documentExtension: string): string[] {
  return fg
    .sync(`**/*${documentExtension}`, {
      cwd: containerAbs,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      unique: true,
    })
    .sort(compareCodePoints);
}

function describeContainer(
  namespace: string,
  name: string,
  absolutePath: string,
  layout: TreeLayout,
): EntryNode {
  const documents = listContainerDocuments(absolutePath, layout.documentExtension);
  const size = documents.reduce((total, document) => total + fileSize(path.join(absolutePath, document)), 0);

  return {
    namespace,
    key: name,
    kind: 'container',
    name,
    path: joinPosix(namespace, layout.peopleDir, name),
    size,
    documents,
  };
}

function describeLeaf(namespace: string, name: string, size: number, layout: TreeLayout): EntryNode {
  return {
    namespace,
    key: stripExtension(name),
    kind: 'leaf',
    name,
    path: joinPosix(namespace, layout.peopleDir, name),
    size,
    documents: [],
  };
}

/**
 * Groups the immediate children of `<root>/<namespace>/<peopleDir>` by
 * identity key. A missing people directory yields an empty group.
 */
export function collectEntries(root: string, namespace: string, layout: TreeLayout = DEFAULT_LAYOUT): EntryGroup {
  const peopleAbs = path.join(root, namespace, layout.peopleDir);
  const groups: EntryGroup = new Map();

  let names: string[];
  try {
    if (!fs.statSync(peopleAbs).isDirectory()) {
      return groups;
    }
    names = fs.readdirSync(peopleAbs).sort(compareCodePoints);
  } catch {
    return groups;
  }

  for (const name of names) {
    if (name === layout.indexDocument) {
      continue;
    }

    const absolutePath = path.join(peopleAbs, name);
    let stats: fs.Stats;
    try {
      stats = fs.statSync(absolutePath);
    } catch (error) {
      logger.debug(`Skipping unreadable entry ${absolutePath}`, { error: errorMessage(error) }, 'EntryCollector');
      continue;
    }

    let node: EntryNode;
    if (stats.isDirectory()) {
      node = describeContainer(namespace, name, absolutePath, layout);
    } else if (stats.isFile()) {
      node = describeLeaf(namespace, name, stats.size, layout);
    } else {
      continue;
    }

    const group = groups.get(node.key) ?? [];
    group.push(node);
    groups.set(node.key, group);
  }

  logger.debug(
    `Collected ${groups.size} keys from ${namespace}/${layout.peopleDir}`,
    undefined,
    'EntryCollector'
  );

  return groups;
}
