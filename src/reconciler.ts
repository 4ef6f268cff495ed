/**
 * Cross-namespace reconciliation of person entries
 */

import { AppError } from './logger.js';
import type {
  Contribution,
  EntryNode,
  NamespaceClassification,
  Reconciliation,
  Winner,
} from './types.js';

/**
 * Given a leaf and a container for the same key, the container wins
 * regardless of size. Otherwise the first node is kept.
 */
export function resolveDirFileDupes(nodes: EntryNode[]): EntryNode {
  const container = nodes.find(node => node.kind === 'container');
  if (container) {
    return container;
  }
  if (nodes.length === 0) {
    throw new AppError('Cannot resolve an empty entry group', 'EMPTY_ENTRY_GROUP');
  }
  return nodes[0];
}

/**
 * Container beats leaf; among the same kind the larger one wins; ties keep
 * the earlier contribution, so callers pass contributions in priority order.
 */
export function isRicher(candidate: EntryNode, current: EntryNode): boolean {
  if (candidate.kind !== current.kind) {
    return candidate.kind === 'container';
  }
  return candidate.size > current.size;
}

export function pickRicher(candidates: Contribution[]): Winner {
  if (candidates.length === 0) {
    throw new AppError('Cannot pick a winner without candidates', 'EMPTY_CANDIDATES');
  }

  let best: Winner = {
    namespace: candidates[0].namespace,
    node: resolveDirFileDupes(candidates[0].nodes),
  };

  for (const candidate of candidates.slice(1)) {
    const node = resolveDirFileDupes(candidate.nodes);
    if (isRicher(node, best.node)) {
      best = { namespace: candidate.namespace, node };
    }
  }

  return best;
}

/**
 * Builds the global person map from per-namespace classifications, which
 * must already be in namespace priority order.
 */
export function reconcile(classifications: NamespaceClassification[]): Reconciliation {
  const people = new Map<string, Contribution[]>();

  for (const classification of classifications) {
    for (const [key, nodes] of classification.persons) {
      const contributions = people.get(key) ?? [];
      contributions.push({ namespace: classification.namespace, nodes });
      people.set(key, contributions);
    }
  }

  const duplicates = new Map<string, Winner>();
  for (const [key, contributions] of people) {
    if (contributions.length > 1) {
      duplicates.set(key, pickRicher(contributions));
    }
  }

  return { people, duplicates };
}
