/**
 * Shared types for the people merge pipeline
 */

export type NodeKind = 'leaf' | 'container';

export type Classification = 'person' | 'non_person';

/**
 * One filesystem entry found directly under a namespace's people directory.
 * Paths are POSIX and relative to the corpus root.
 */
export interface EntryNode {
  namespace: string;
  key: string;
  kind: NodeKind;
  /** Base name on disk, extension included for leaves */
  name: string;
  path: string;
  size: number;
  /** Container-relative document paths, sorted; empty for leaves */
  documents: string[];
}

/** Identity key -> nodes sharing it inside one namespace, in discovery order */
export type EntryGroup = Map<string, EntryNode[]>;

export interface Relocation {
  nodes: EntryNode[];
  destination: string;
}

export interface NamespaceClassification {
  namespace: string;
  curated: boolean;
  persons: EntryGroup;
  nonPersons: EntryGroup;
  relocations: Map<string, Relocation>;
}

export interface Contribution {
  namespace: string;
  nodes: EntryNode[];
}

export interface Winner {
  namespace: string;
  node: EntryNode;
}

export interface Reconciliation {
  /** Global person map, keys in first-seen order across the namespace priority list */
  people: Map<string, Contribution[]>;
  duplicates: Map<string, Winner>;
}

export type OperationStatus = 'planned' | 'applied' | 'skipped' | 'failed';

export type MoveCategory = 'person' | 'archive' | 'relocation';

export interface MoveOperation {
  operation: 'move';
  category: MoveCategory;
  nodeKind: NodeKind;
  sourcePath: string;
  destinationPath: string;
  description: string;
}

export interface RemoveOperation {
  operation: 'remove';
  nodeKind: NodeKind;
  sourcePath: string;
  reason: string;
}

export interface RelocationPlan {
  moves: MoveOperation[];
  removals: RemoveOperation[];
}

/** Old extension-less document path -> new extension-less document path */
export type RedirectMapping = Map<string, string>;

/**
 * Where things live inside the corpus root
 */
export interface TreeLayout {
  /** Per-namespace directory holding person entries */
  peopleDir: string;
  /** Unified destination for every person entry */
  targetDir: string;
  /** Per-namespace archive directory for non-person entries */
  archiveDir: string;
  indexDocument: string;
  documentExtension: string;
}

export const DEFAULT_LAYOUT: TreeLayout = {
  peopleDir: 'people',
  targetDir: 'people',
  archiveDir: 'archive',
  indexDocument: 'index.md',
  documentExtension: '.md',
};
