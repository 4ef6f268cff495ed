/**
 * Old-path -> new-path redirects for every relocated or removed document,
 * and the chain-resolving merge into the persisted mapping.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import path from 'path';
import { AppError, errorMessage, logger } from './logger.js';
import { isRecord } from './config.js';
import { compareCodePoints, joinPosix, removeSuffix, stripExtension } from './paths.js';
import { resolveDirFileDupes } from './reconciler.js';
import { archiveDirectory, destinationFor } from './relocation-planner.js';
import {
  DEFAULT_LAYOUT,
  type EntryNode,
  type NamespaceClassification,
  type Reconciliation,
  type RedirectMapping,
  type TreeLayout,
} from './types.js';

export interface ChainRewrite {
  source: string;
  from: string;
  to: string;
}

export interface RedirectMergeResult {
  mapping: RedirectMapping;
  added: number;
  rewritten: ChainRewrite[];
  /** Sources dropped because their path is live again or they formed a cycle */
  dropped: string[];
}

function oldBarePath(node: EntryNode): string {
  return node.kind === 'container' ? node.path : joinPosix(path.posix.dirname(node.path), node.key);
}

function newBarePath(node: EntryNode, destination: string): string {
  return node.kind === 'container' ? destination : joinPosix(path.posix.dirname(destination), node.key);
}

function addMovedNode(redirects: RedirectMapping, node: EntryNode, destination: string, layout: TreeLayout): void {
  const oldPath = oldBarePath(node);
  const newPath = newBarePath(node, destination);

  if (node.kind === 'leaf') {
    redirects.set(oldPath, newPath);
    return;
  }

  const indexStem = stripExtension(layout.indexDocument);
  redirects.set(`${oldPath}/${indexStem}`, `${newPath}/${indexStem}`);
  redirects.set(oldPath, newPath);
  for (const document of node.documents) {
    const documentPath = removeSuffix(document, layout.documentExtension);
    redirects.set(`${oldPath}/${documentPath}`, `${newPath}/${documentPath}`);
  }
}

/**
 * A removed node points at the node that replaced it. Documents the winner
 * also has map one-to-one; the rest land on the winner's main page.
 */
function addRemovedNode(
  redirects: RedirectMapping,
  node: EntryNode,
  winner: EntryNode,
  winnerDestination: string,
  layout: TreeLayout,
): void {
  const oldPath = oldBarePath(node);
  const target = newBarePath(winner, winnerDestination);
  const indexStem = stripExtension(layout.indexDocument);
  const landing = winner.kind === 'container' ? `${target}/${indexStem}` : target;

  if (node.kind === 'leaf') {
    redirects.set(oldPath, target);
    return;
  }

  redirects.set(`${oldPath}/${indexStem}`, landing);
  redirects.set(oldPath, target);

  const winnerDocuments = new Set(winner.documents);
  for (const document of node.documents) {
    const documentPath = removeSuffix(document, layout.documentExtension);
    const successor = winnerDocuments.has(document) ? `${target}/${documentPath}` : landing;
    redirects.set(`${oldPath}/${documentPath}`, successor);
  }
}

export function buildRedirects(
  classifications: NamespaceClassification[],
  reconciliation: Reconciliation,
  layout: TreeLayout = DEFAULT_LAYOUT,
): RedirectMapping {
  const redirects: RedirectMapping = new Map();

  for (const [key, contributions] of reconciliation.people) {
    const winner = reconciliation.duplicates.get(key)?.node ?? resolveDirFileDupes(contributions[0].nodes);
    const winnerDestination = destinationFor(winner, layout.targetDir);

    for (const contribution of contributions) {
      for (const node of contribution.nodes) {
        if (node.path === winner.path) {
          addMovedNode(redirects, node, winnerDestination, layout);
        } else {
          addRemovedNode(redirects, node, winner, winnerDestination, layout);
        }
      }
    }
  }

  for (const classification of classifications) {
    const archive = archiveDirectory(classification.namespace, layout);
    for (const nodes of classification.nonPersons.values()) {
      for (const node of nodes) {
        addMovedNode(redirects, node, destinationFor(node, archive), layout);
      }
    }

    for (const relocation of classification.relocations.values()) {
      for (const node of relocation.nodes) {
        addMovedNode(redirects, node, destinationFor(node, relocation.destination), layout);
      }
    }
  }

  return redirects;
}

function sortMapping(mapping: RedirectMapping): RedirectMapping {
  return new Map([...mapping.entries()].sort(([left], [right]) => compareCodePoints(left, right)));
}

/**
 * Removes every entry that takes part in a redirect cycle
 */
function dropCycles(mapping: RedirectMapping): string[] {
  const cyclic = new Set<string>();

  for (const source of mapping.keys()) {
    const trail: string[] = [source];
    let current = mapping.get(source);

    while (current !== undefined && mapping.has(current) && !cyclic.has(current)) {
      const seenAt = trail.indexOf(current);
      if (seenAt >= 0) {
        for (const member of trail.slice(seenAt)) {
          cyclic.add(member);
        }
        break;
      }
      trail.push(current);
      current = mapping.get(current);
    }
  }

  for (const source of cyclic) {
    mapping.delete(source);
  }
  return [...cyclic];
}

/**
 * Points every entry straight at its final destination.
 */
export function resolveChains(mapping: RedirectMapping): ChainRewrite[] {
  const rewritten: ChainRewrite[] = [];

  for (const [source, target] of mapping) {
    let final = target;
    let hops = 0;
    while (hops < mapping.size) {
      const next = mapping.get(final);
      if (next === undefined) break;
      final = next;
      hops++;
    }

    if (final !== target) {
      mapping.set(source, final);
      rewritten.push({ source, from: target, to: final });
    }
  }

  return rewritten;
}

/**
 * Merges freshly built redirects into the persisted ones. Existing entries
 * win over fresh ones for the same source; an existing entry whose source is
 * now a live destination is dropped; chains collapse to a single hop.
 */
export function mergeRedirects(existing: RedirectMapping, fresh: RedirectMapping): RedirectMergeResult {
  const mapping: RedirectMapping = new Map(existing);
  let added = 0;

  for (const [source, target] of fresh) {
    if (!mapping.has(source)) {
      mapping.set(source, target);
      added++;
    }
  }

  const liveDestinations = new Set(fresh.values());
  const dropped: string[] = [];
  for (const source of [...mapping.keys()]) {
    if (liveDestinations.has(source) && !fresh.has(source)) {
      mapping.delete(source);
      dropped.push(source);
    }
  }

  const cyclic = dropCycles(mapping);
  if (cyclic.length > 0) {
    logger.warn(
      `Dropped ${cyclic.length} redirects that formed a cycle`,
      { sources: cyclic },
      'RedirectMap'
    );
    dropped.push(...cyclic);
  }

  const rewritten = resolveChains(mapping);

  return {
    mapping: sortMapping(mapping),
    added,
    rewritten,
    dropped,
  };
}

/**
 * Reads the persisted mapping. A missing file is an empty mapping; anything
 * other than a JSON object of strings is fatal.
 */
export function loadRedirectMapping(filePath: string): RedirectMapping {
  if (!existsSync(filePath)) {
    return new Map();
  }

  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new AppError(
      `Redirect mapping is not valid JSON: ${errorMessage(error)}`,
      'REDIRECTS_UNREADABLE',
      { path: filePath }
    );
  }

  if (!isRecord(payload)) {
    throw new AppError('Redirect mapping must be a JSON object', 'REDIRECTS_UNREADABLE', { path: filePath });
  }

  const mapping: RedirectMapping = new Map();
  for (const [source, target] of Object.entries(payload)) {
    if (typeof target !== 'string') {
      throw new AppError(
        `Redirect target for "${source}" is not a string`,
        'REDIRECTS_UNREADABLE',
        { path: filePath, source }
      );
    }
    mapping.set(source, target);
  }
  return mapping;
}

/**
 * Two-space JSON, keys in code-point order, trailing newline. Built by hand
 * so integer-like keys keep their sorted position.
 */
export function serializeRedirectMapping(mapping: RedirectMapping): string {
  const entries = [...sortMapping(mapping).entries()];
  if (entries.length === 0) {
    return '{}\n';
  }

  const lines = entries.map(([source, target]) => `  ${JSON.stringify(source)}: ${JSON.stringify(target)}`);
  return `{\n${lines.join(',\n')}\n}\n`;
}

export function writeRedirectMapping(filePath: string, mapping: RedirectMapping): void {
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, serializeRedirectMapping(mapping), 'utf8');
}
