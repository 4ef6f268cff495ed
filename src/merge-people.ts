/**
 * End-to-end people merge: collect, classify, reconcile, plan, execute.
 */

import path from 'path';
import { logger } from './logger.js';
import type { MergeConfig } from './config.js';
import { collectEntries } from './entry-collector.js';
import { execute, type ExecutionReport } from './executor.js';
import { createNodeOperations, type NodeOperations } from './node-operations.js';
import { classifyNamespace, PersonClassifier } from './person-classifier.js';
import { reconcile } from './reconciler.js';
import { buildRedirects } from './redirect-map.js';
import { planRelocations } from './relocation-planner.js';
import type { NamespaceClassification, Reconciliation, RedirectMapping, RelocationPlan } from './types.js';

export interface MergePlan {
  classifications: NamespaceClassification[];
  reconciliation: Reconciliation;
  plan: RelocationPlan;
  redirects: RedirectMapping;
}

export interface RunMergeOptions {
  dryRun: boolean;
  classifier?: PersonClassifier;
  operations?: NodeOperations;
}

export interface MergeResult extends MergePlan {
  report: ExecutionReport;
}

/**
 * Reads the tree and computes everything a run needs without mutating it.
 */
export function planMerge(root: string, config: MergeConfig, classifier: PersonClassifier): MergePlan {
  const classifications = config.namespaces.map(namespace => {
    const group = collectEntries(root, namespace.name, config.layout);
    const classification = classifyNamespace(namespace, group, classifier);

    logger.info(
      `${namespace.name}: ${group.size} entries`,
      {
        persons: classification.persons.size,
        nonPersons: classification.nonPersons.size,
        relocations: classification.relocations.size,
      },
      'MergePeople'
    );

    for (const key of classification.nonPersons.keys()) {
      logger.debug(`${namespace.name}: classified ${key} as non-person`, undefined, 'MergePeople');
    }

    return classification;
  });

  const reconciliation = reconcile(classifications);
  logger.info(
    `${reconciliation.people.size} unique people, ${reconciliation.duplicates.size} cross-namespace duplicates`,
    undefined,
    'MergePeople'
  );

  const plan = planRelocations(classifications, reconciliation, config.layout);
  const redirects = buildRedirects(classifications, reconciliation, config.layout);

  return { classifications, reconciliation, plan, redirects };
}

export function runMerge(root: string, config: MergeConfig, options: RunMergeOptions): MergeResult {
  const rootAbs = path.resolve(root);
  const classifier = options.classifier ?? PersonClassifier.fromFile(config.classifier.namesFile);
  const merge = planMerge(rootAbs, config, classifier);

  const report = execute(merge.plan, merge.redirects, {
    root: rootAbs,
    dryRun: options.dryRun,
    layout: config.layout,
    namespaces: config.namespaces.map(namespace => namespace.name),
    redirectsFile: config.redirects.file,
    indexLinks: config.indexLinks,
    pruneEmptyPeopleDirs: config.execution.pruneEmptyPeopleDirs,
    operations: options.operations ?? createNodeOperations(rootAbs, config.execution.useGit),
  });

  return { ...merge, report };
}
