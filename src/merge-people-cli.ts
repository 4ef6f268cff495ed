#!/usr/bin/env node
/**
 * Merge People CLI
 */

import { config } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager } from './config.js';
import { logger, handleError, isLogLevel } from './logger.js';
import { runMerge } from './merge-people.js';

config({ override: false });

export interface CliOptions {
  dryRun: boolean;
  root: string;
  configPath?: string;
  noGit: boolean;
  verbose: boolean;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  let dryRun = false;
  let root = env.MERGE_ROOT?.trim() || process.cwd();
  let configPath: string | undefined;
  let noGit = false;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--dry-run') {
      dryRun = true;
      continue;
    }

    if (arg === '--root') {
      const value = argv[++i];
      if (!value || value.startsWith('--')) {
        throw new Error('Missing value for --root');
      }
      root = value;
      continue;
    }

    if (arg === '--config') {
      const value = argv[++i];
      if (!value || value.startsWith('--')) {
        throw new Error('Missing value for --config');
      }
      configPath = value;
      continue;
    }

    if (arg === '--no-git') {
      noGit = true;
      continue;
    }

    if (arg === '--verbose') {
      verbose = true;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return { dryRun, root, configPath, noGit, verbose };
}

/**
 * Runs one merge and returns the process exit code.
 */
export function runCli(argv: string[]): number {
  const options = parseArgs(argv);
  const rootAbs = path.resolve(options.root);

  const configManager = new ConfigManager(options.configPath ?? path.join(rootAbs, 'merge-people.yaml'));
  const validation = configManager.validate();
  if (!validation.valid) {
    for (const message of validation.errors) {
      console.error(`Invalid configuration: ${message}`);
    }
    return 1;
  }

  const mergeConfig = configManager.getAll();
  if (options.noGit) {
    mergeConfig.execution.useGit = false;
  }

  if (options.verbose) {
    logger.setMinLevel('debug');
  } else if (!isLogLevel(process.env.LOG_LEVEL)) {
    logger.setMinLevel(mergeConfig.logLevel);
  }

  try {
    const { report } = runMerge(rootAbs, mergeConfig, { dryRun: options.dryRun });

    console.log(options.dryRun ? '=== DRY RUN ===' : '=== APPLY ===');
    for (const line of report.lines) {
      console.log(line);
    }

    const { applied, skipped, failed } = report.statuses;
    if (report.dryRun) {
      console.log(`\nDry run complete. ${report.moves.length} moves, ${report.removals.length} removals planned.`);
      return 0;
    }

    console.log(`\nApplied: ${applied}, skipped: ${skipped}, failed: ${failed}`);
    if (failed > 0) {
      // per-item failures are reported above and leave the exit code alone
      logger.warn(`${failed} operations failed; re-run after fixing them`, undefined, 'MergePeopleCLI');
      return 0;
    }
    logger.success(`Merged people into ${mergeConfig.layout.targetDir}/`);
    return 0;
  } catch (error) {
    const appError = handleError(error, 'MergePeopleCLI');
    console.error(`${appError.code}: ${appError.message}`);
    return 1;
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = process.argv[1] ? path.resolve(process.argv[1]) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  try {
    process.exitCode = runCli(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
