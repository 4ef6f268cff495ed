/**
 * Index documents: the generated listing of the unified target and the
 * one-line link edits in the root and namespace indexes.
 */

import fs from 'fs';
import path from 'path';
import { compareCodePoints, stripExtension } from './paths.js';
import type { TreeLayout } from './types.js';

/**
 * Toctree entries for every top-level item of the target directory.
 * A container with an index is listed once; one without lists its direct
 * documents; leaves other than documents are ignored.
 */
export function listTargetEntries(targetAbs: string, layout: TreeLayout): string[] {
  if (!fs.existsSync(targetAbs)) {
    return [];
  }

  const entries: string[] = [];
  const indexStem = stripExtension(layout.indexDocument);
  const names = fs.readdirSync(targetAbs).sort(compareCodePoints);

  for (const name of names) {
    if (name === layout.indexDocument) continue;

    const itemAbs = path.join(targetAbs, name);
    const stats = fs.statSync(itemAbs);

    if (stats.isDirectory()) {
      if (fs.existsSync(path.join(itemAbs, layout.indexDocument))) {
        entries.push(`${name}/${indexStem}`);
        continue;
      }

      const documents = fs
        .readdirSync(itemAbs)
        .filter(child => child.endsWith(layout.documentExtension))
        .filter(child => fs.statSync(path.join(itemAbs, child)).isFile())
        .sort(compareCodePoints);
      for (const document of documents) {
        entries.push(`${name}/${stripExtension(document)}`);
      }
      continue;
    }

    if (name.endsWith(layout.documentExtension)) {
      entries.push(stripExtension(name));
    }
  }

  return entries;
}

export function renderTargetIndex(title: string, entries: string[]): string {
  const lines = [
    `# ${title}`,
    '',
    `This section contains ${entries.length} pages.`,
    '',
    '```{toctree}',
    ':maxdepth: 1',
    ':hidden:',
    '',
    ...entries,
    '```',
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Inserts `entry` before every `anchor` line unless the text already links
 * it. Returns null when nothing changes.
 */
export function insertIndexLink(text: string, entry: string, anchor: string): string | null {
  if (text.includes(entry)) {
    return null;
  }
  const anchorLine = `${anchor}\n`;
  if (!text.includes(anchorLine)) {
    return null;
  }
  return text.split(anchorLine).join(`${entry}\n${anchorLine}`);
}

/**
 * Removes every `entry` line. Returns null when nothing changes.
 */
export function removeIndexLink(text: string, entry: string): string | null {
  const entryLine = `${entry}\n`;
  if (!text.includes(entryLine)) {
    return null;
  }
  return text.split(entryLine).join('');
}
