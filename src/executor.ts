/**
 * Applies a relocation plan, or describes it without touching anything.
 */

import fs from 'fs';
import path from 'path';
import { errorMessage, logger } from './logger.js';
import type { IndexLinksConfig } from './config.js';
import { createNodeOperations, type NodeOperations } from './node-operations.js';
import {
  insertIndexLink,
  listTargetEntries,
  removeIndexLink,
  renderTargetIndex,
} from './people-index.js';
import {
  loadRedirectMapping,
  mergeRedirects,
  writeRedirectMapping,
  type RedirectMergeResult,
} from './redirect-map.js';
import { compareCodePoints, joinPosix } from './paths.js';
import type {
  OperationStatus,
  RedirectMapping,
  RelocationPlan,
  TreeLayout,
} from './types.js';

export interface ExecuteOptions {
  root: string;
  dryRun: boolean;
  layout: TreeLayout;
  namespaces: string[];
  /** Root-relative path of the persisted redirect mapping */
  redirectsFile: string;
  indexLinks: IndexLinksConfig;
  pruneEmptyPeopleDirs?: boolean;
  /** Defaults to git with a filesystem fallback */
  operations?: NodeOperations;
}

export interface ItemResult {
  operation: 'move' | 'remove';
  sourcePath: string;
  destinationPath?: string;
  status: OperationStatus;
  reason?: string;
}

export interface RedirectSummary {
  fresh: number;
  added: number;
  total: number;
  rewritten: RedirectMergeResult['rewritten'];
  dropped: string[];
  written: boolean;
}

export interface ExecutionReport {
  dryRun: boolean;
  moves: ItemResult[];
  removals: ItemResult[];
  redirects: RedirectSummary;
  indexEntries: number;
  indexEdits: string[];
  prunedDirectories: string[];
  statuses: Record<OperationStatus, number>;
  /** Human-readable account of the run, one line per item */
  lines: string[];
}

function countStatuses(items: ItemResult[]): Record<OperationStatus, number> {
  const counts: Record<OperationStatus, number> = {
    planned: 0,
    applied: 0,
    skipped: 0,
    failed: 0,
  };
  for (const item of items) {
    counts[item.status] += 1;
  }
  return counts;
}

function sortedEntries(mapping: RedirectMapping): [string, string][] {
  return [...mapping.entries()].sort(([left], [right]) => compareCodePoints(left, right));
}

function describeRedirects(
  lines: string[],
  fresh: RedirectMapping,
  merge: RedirectMergeResult | null,
): void {
  lines.push('', `Redirects: ${fresh.size}`);
  for (const [source, target] of sortedEntries(fresh)) {
    lines.push(`  ${source} -> ${target}`);
  }

  if (!merge) return;

  if (merge.rewritten.length > 0) {
    lines.push('', `Chain rewrites: ${merge.rewritten.length}`);
    for (const rewrite of merge.rewritten) {
      lines.push(`  ${rewrite.source}: ${rewrite.from} => ${rewrite.to}`);
    }
  }

  if (merge.dropped.length > 0) {
    lines.push('', `Dropped redirects: ${merge.dropped.length}`);
    for (const source of merge.dropped) {
      lines.push(`  ${source}`);
    }
  }
}

function executeDryRun(plan: RelocationPlan, fresh: RedirectMapping, options: ExecuteOptions): ExecutionReport {
  const lines: string[] = [`Moves planned: ${plan.moves.length}`];
  for (const move of plan.moves) {
    lines.push(`  ${move.description}`);
    lines.push(`    ${move.sourcePath} -> ${move.destinationPath}`);
  }

  lines.push('', `Removes planned: ${plan.removals.length}`);
  for (const removal of plan.removals) {
    lines.push(`  RM ${removal.sourcePath}: ${removal.reason}`);
  }

  let merge: RedirectMergeResult | null = null;
  try {
    const existing = loadRedirectMapping(path.join(options.root, options.redirectsFile));
    merge = mergeRedirects(existing, fresh);
  } catch (error) {
    lines.push('', `WARNING: ${errorMessage(error)}; a live run would stop before changing anything`);
  }

  describeRedirects(lines, fresh, merge);

  const moves: ItemResult[] = plan.moves.map(move => ({
    operation: 'move',
    sourcePath: move.sourcePath,
    destinationPath: move.destinationPath,
    status: 'planned',
    reason: move.description,
  }));
  const removals: ItemResult[] = plan.removals.map(removal => ({
    operation: 'remove',
    sourcePath: removal.sourcePath,
    status: 'planned',
    reason: removal.reason,
  }));

  return {
    dryRun: true,
    moves,
    removals,
    redirects: {
      fresh: fresh.size,
      added: merge?.added ?? 0,
      total: merge?.mapping.size ?? fresh.size,
      rewritten: merge?.rewritten ?? [],
      dropped: merge?.dropped ?? [],
      written: false,
    },
    indexEntries: 0,
    indexEdits: [],
    prunedDirectories: [],
    statuses: countStatuses([...moves, ...removals]),
    lines,
  };
}

function applyMove(
  operations: NodeOperations,
  root: string,
  sourcePath: string,
  destinationPath: string,
  lines: string[],
): ItemResult {
  const item: ItemResult = { operation: 'move', sourcePath, destinationPath, status: 'planned' };

  if (!fs.existsSync(path.join(root, sourcePath))) {
    logger.warn(`Skipping move of missing source ${sourcePath}`, undefined, 'Executor');
    lines.push(`SKIP (missing): ${sourcePath}`);
    return { ...item, status: 'skipped', reason: 'Source does not exist' };
  }

  try {
    operations.move(sourcePath, destinationPath);
    logger.info(`Moved ${sourcePath} -> ${destinationPath}`, undefined, 'Executor');
    lines.push(`MOVE: ${sourcePath} -> ${destinationPath}`);
    return { ...item, status: 'applied' };
  } catch (error) {
    const reason = errorMessage(error);
    logger.error(`Move failed for ${sourcePath}`, error instanceof Error ? error : undefined, 'Executor');
    lines.push(`FAILED move ${sourcePath}: ${reason}`);
    return { ...item, status: 'failed', reason };
  }
}

function applyRemoval(
  operations: NodeOperations,
  root: string,
  sourcePath: string,
  reason: string,
  lines: string[],
): ItemResult {
  const item: ItemResult = { operation: 'remove', sourcePath, status: 'planned', reason };

  if (!fs.existsSync(path.join(root, sourcePath))) {
    logger.warn(`Skipping removal of missing source ${sourcePath}`, undefined, 'Executor');
    lines.push(`SKIP (missing): ${sourcePath}`);
    return { ...item, status: 'skipped', reason: 'Source does not exist' };
  }

  try {
    operations.remove(sourcePath);
    logger.info(`Removed ${sourcePath} (${reason})`, undefined, 'Executor');
    lines.push(`RM: ${sourcePath} (${reason})`);
    return { ...item, status: 'applied' };
  } catch (error) {
    const failure = errorMessage(error);
    logger.error(`Removal failed for ${sourcePath}`, error instanceof Error ? error : undefined, 'Executor');
    lines.push(`FAILED rm ${sourcePath}: ${failure}`);
    return { ...item, status: 'failed', reason: failure };
  }
}

function rewriteFile(filePath: string, edit: (text: string) => string | null): boolean {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Index document not found: ${filePath}`, undefined, 'Executor');
    return false;
  }
  const updated = edit(fs.readFileSync(filePath, 'utf-8'));
  if (updated === null) {
    return false;
  }
  fs.writeFileSync(filePath, updated, 'utf8');
  return true;
}

function updateIndexLinks(options: ExecuteOptions, lines: string[]): string[] {
  const { root, indexLinks, layout } = options;
  const edits: string[] = [];

  const rootIndexPath = path.join(root, indexLinks.rootIndex);
  if (rewriteFile(rootIndexPath, text => insertIndexLink(text, indexLinks.targetEntry, indexLinks.insertBefore))) {
    edits.push(`Added ${indexLinks.targetEntry} to ${indexLinks.rootIndex}`);
  }

  for (const namespace of options.namespaces) {
    const relativeIndex = joinPosix(namespace, layout.indexDocument);
    if (rewriteFile(path.join(root, relativeIndex), text => removeIndexLink(text, indexLinks.namespaceEntry))) {
      edits.push(`Removed ${indexLinks.namespaceEntry} from ${relativeIndex}`);
    }
  }

  for (const edit of edits) {
    lines.push(edit);
  }
  return edits;
}

function pruneEmptyPeopleDirs(options: ExecuteOptions, operations: NodeOperations, lines: string[]): string[] {
  const pruned: string[] = [];

  for (const namespace of options.namespaces) {
    const relativePeople = joinPosix(namespace, options.layout.peopleDir);
    const peopleAbs = path.join(options.root, relativePeople);
    if (!fs.existsSync(peopleAbs)) continue;

    const remaining = fs.readdirSync(peopleAbs);
    if (remaining.length > 0 && !(remaining.length === 1 && remaining[0] === options.layout.indexDocument)) {
      logger.info(
        `${relativePeople} still has ${remaining.length} entries`,
        { sample: remaining.sort(compareCodePoints).slice(0, 5) },
        'Executor'
      );
      continue;
    }

    try {
      operations.remove(relativePeople);
      pruned.push(relativePeople);
      lines.push(`Removed ${relativePeople}/ (empty)`);
    } catch (error) {
      logger.error(`Could not remove ${relativePeople}`, error instanceof Error ? error : undefined, 'Executor');
    }
  }

  return pruned;
}

/**
 * Live runs load the redirect store before mutating anything, so an
 * unreadable store aborts with the tree untouched.
 */
export function execute(plan: RelocationPlan, redirects: RedirectMapping, options: ExecuteOptions): ExecutionReport {
  if (options.dryRun) {
    return executeDryRun(plan, redirects, options);
  }

  const { root, layout } = options;
  const redirectsPath = path.join(root, options.redirectsFile);
  const existing = loadRedirectMapping(redirectsPath);
  const operations = options.operations ?? createNodeOperations(root, true);
  const lines: string[] = [];

  logger.info(
    `Applying ${plan.moves.length} moves and ${plan.removals.length} removals`,
    { operations: operations.name },
    'Executor'
  );

  const moves = plan.moves.map(move =>
    applyMove(operations, root, move.sourcePath, move.destinationPath, lines),
  );
  const removals = plan.removals.map(removal =>
    applyRemoval(operations, root, removal.sourcePath, removal.reason, lines),
  );

  const merge = mergeRedirects(existing, redirects);
  writeRedirectMapping(redirectsPath, merge.mapping);
  lines.push(`Wrote ${merge.mapping.size} total redirects`);
  describeRedirects(lines, redirects, merge);

  const targetAbs = path.join(root, layout.targetDir);
  fs.mkdirSync(targetAbs, { recursive: true });
  const entries = listTargetEntries(targetAbs, layout);
  fs.writeFileSync(
    path.join(targetAbs, layout.indexDocument),
    renderTargetIndex(options.indexLinks.title, entries),
    'utf8'
  );
  lines.push(`Generated ${joinPosix(layout.targetDir, layout.indexDocument)} with ${entries.length} entries`);

  const indexEdits = updateIndexLinks(options, lines);
  const prunedDirectories = options.pruneEmptyPeopleDirs === false
    ? []
    : pruneEmptyPeopleDirs(options, operations, lines);

  return {
    dryRun: false,
    moves,
    removals,
    redirects: {
      fresh: redirects.size,
      added: merge.added,
      total: merge.mapping.size,
      rewritten: merge.rewritten,
      dropped: merge.dropped,
      written: true,
    },
    indexEntries: entries.length,
    indexEdits,
    prunedDirectories,
    statuses: countStatuses([...moves, ...removals]),
    lines,
  };
}
