/**
 * Turns classification and reconciliation results into a declarative plan of
 * moves and removals. Nothing is executed here.
 */

import { AppError } from './logger.js';
import { joinPosix } from './paths.js';
import { resolveDirFileDupes } from './reconciler.js';
import {
  DEFAULT_LAYOUT,
  type EntryNode,
  type MoveCategory,
  type MoveOperation,
  type NamespaceClassification,
  type Reconciliation,
  type RelocationPlan,
  type RemoveOperation,
  type TreeLayout,
} from './types.js';

export const DIR_FILE_DUPE_REASON = 'dir+file dupe, keeping dir';

export function crossNamespaceDupeReason(winningNamespace: string): string {
  return `cross-wiki dupe, keeping ${winningNamespace}`;
}

/** Containers keep their key as directory name, leaves keep their file name */
export function destinationFor(node: EntryNode, baseDirectory: string): string {
  return joinPosix(baseDirectory, node.kind === 'container' ? node.key : node.name);
}

export function archiveDirectory(namespace: string, layout: TreeLayout): string {
  return joinPosix(namespace, layout.archiveDir);
}

function moveOf(node: EntryNode, destinationPath: string, category: MoveCategory, description: string): MoveOperation {
  return {
    operation: 'move',
    category,
    nodeKind: node.kind,
    sourcePath: node.path,
    destinationPath,
    description,
  };
}

function removalOf(node: EntryNode, reason: string): RemoveOperation {
  return {
    operation: 'remove',
    nodeKind: node.kind,
    sourcePath: node.path,
    reason,
  };
}

/**
 * Throws when a node would be both moved and removed, or moved twice.
 */
export function assertDisjoint(plan: RelocationPlan): void {
  const moved = new Set<string>();
  for (const move of plan.moves) {
    if (moved.has(move.sourcePath)) {
      throw new AppError(`Node planned to move twice: ${move.sourcePath}`, 'PLAN_NOT_DISJOINT');
    }
    moved.add(move.sourcePath);
  }

  for (const removal of plan.removals) {
    if (moved.has(removal.sourcePath)) {
      throw new AppError(
        `Node planned for both move and removal: ${removal.sourcePath}`,
        'PLAN_NOT_DISJOINT',
        { reason: removal.reason }
      );
    }
  }
}

export function planRelocations(
  classifications: NamespaceClassification[],
  reconciliation: Reconciliation,
  layout: TreeLayout = DEFAULT_LAYOUT,
): RelocationPlan {
  const moves: MoveOperation[] = [];
  const removals: RemoveOperation[] = [];

  for (const [key, contributions] of reconciliation.people) {
    const duplicateWinner = reconciliation.duplicates.get(key);

    if (!duplicateWinner) {
      const { namespace, nodes } = contributions[0];
      const winner = resolveDirFileDupes(nodes);
      moves.push(moveOf(
        winner,
        destinationFor(winner, layout.targetDir),
        'person',
        `${namespace}/${layout.peopleDir}/${key} -> ${layout.targetDir}/`,
      ));

      for (const node of nodes) {
        if (node.path !== winner.path) {
          removals.push(removalOf(node, DIR_FILE_DUPE_REASON));
        }
      }
      continue;
    }

    const winner = duplicateWinner.node;
    moves.push(moveOf(
      winner,
      destinationFor(winner, layout.targetDir),
      'person',
      `dupe winner: ${duplicateWinner.namespace}/${layout.peopleDir}/${key}`,
    ));

    for (const contribution of contributions) {
      const isWinningNamespace = contribution.namespace === duplicateWinner.namespace;
      for (const node of contribution.nodes) {
        if (!isWinningNamespace) {
          removals.push(removalOf(node, crossNamespaceDupeReason(duplicateWinner.namespace)));
        } else if (node.path !== winner.path) {
          removals.push(removalOf(node, DIR_FILE_DUPE_REASON));
        }
      }
    }
  }

  for (const classification of classifications) {
    const archive = archiveDirectory(classification.namespace, layout);
    for (const nodes of classification.nonPersons.values()) {
      for (const node of nodes) {
        moves.push(moveOf(node, destinationFor(node, archive), 'archive', `non-person: ${node.path} -> ${archive}/`));
      }
    }
  }

  for (const classification of classifications) {
    for (const [key, relocation] of classification.relocations) {
      for (const node of relocation.nodes) {
        moves.push(moveOf(
          node,
          destinationFor(node, relocation.destination),
          'relocation',
          `relocated non-person: ${classification.namespace}/${key} -> ${joinPosix(relocation.destination)}/`,
        ));
      }
    }
  }

  const plan = { moves, removals };
  assertDisjoint(plan);
  return plan;
}
