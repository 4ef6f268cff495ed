/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import path from 'path';
import YAML from 'js-yaml';
import { logger, isLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_LAYOUT, type TreeLayout } from './types.js';

export interface NamespaceConfig {
  name: string;
  /**
   * Curated namespaces contribute every people entry as a person;
   * uncurated ones go through the person classifier.
   */
  curated: boolean;
  /** Identity key -> root-relative destination directory for known non-person entries */
  relocations?: Record<string, string>;
}

export interface ClassifierConfig {
  /** Path to the non-person name sets; defaults to the bundled data file */
  namesFile?: string;
}

export interface RedirectsConfig {
  /** Root-relative path of the persisted redirect mapping */
  file: string;
}

export interface IndexLinksConfig {
  /** Root-relative path of the top-level index document */
  rootIndex: string;
  /** Line added to the root index for the unified target */
  targetEntry: string;
  /** Line the target entry is inserted before */
  insertBefore: string;
  /** Line removed from each namespace index */
  namespaceEntry: string;
  /** Heading of the generated target index */
  title: string;
}

export interface ExecutionConfig {
  /** Try git mv / git rm before plain filesystem operations */
  useGit: boolean;
  /** Remove namespace people directories left holding only their index */
  pruneEmptyPeopleDirs: boolean;
}

export interface MergeConfig {
  namespaces: NamespaceConfig[];
  layout: TreeLayout;
  classifier: ClassifierConfig;
  redirects: RedirectsConfig;
  indexLinks: IndexLinksConfig;
  execution: ExecutionConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: MergeConfig = {
  namespaces: [
    { name: 'python', curated: false },
    { name: 'psf', curated: true },
    { name: 'jython', curated: true, relocations: { SummerOfCode: 'jython/community' } },
  ],
  layout: { ...DEFAULT_LAYOUT },
  classifier: {},
  redirects: {
    file: '_redirects.json'
  },
  indexLinks: {
    rootIndex: 'index.md',
    targetEntry: 'people/index',
    insertBefore: 'python/index',
    namespaceEntry: 'people/index',
    title: 'People'
  },
  execution: {
    useGit: true,
    pruneEmptyPeopleDirs: true
  },
  logLevel: 'info'
};

function cloneConfig(config: MergeConfig): MergeConfig {
  return structuredClone(config);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function readStringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
}

function readNamespaces(value: unknown, fallback: NamespaceConfig[]): NamespaceConfig[] {
  if (!Array.isArray(value)) return fallback;

  const namespaces: NamespaceConfig[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      namespaces.push({ name: item, curated: true });
      continue;
    }
    if (!isRecord(item) || typeof item.name !== 'string') {
      logger.warn('Ignoring malformed namespace entry', { entry: item }, 'ConfigManager');
      continue;
    }
    namespaces.push({
      name: item.name,
      curated: readBoolean(item.curated, true),
      relocations: readStringRecord(item.relocations),
    });
  }
  return namespaces;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: MergeConfig;
  private configPath: string;
  private loadError: string | null = null;

  constructor(configPath: string = './merge-people.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): MergeConfig {
    if (!existsSync(this.configPath)) {
      logger.info(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let config: unknown;

      if (this.configPath.endsWith('.json')) {
        config = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        config = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      if (config !== undefined && config !== null && !isRecord(config)) {
        throw new Error('Configuration root must be a mapping');
      }

      logger.info(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      // Merge with defaults
      return this.resolveRelativePaths(this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), isRecord(config) ? config : {}));
    } catch (error) {
      this.loadError = `Failed to load config ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn(this.loadError, undefined, 'ConfigManager');
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * File paths inside the config are relative to the config file
   */
  private resolveRelativePaths(config: MergeConfig): MergeConfig {
    const { namesFile } = config.classifier;
    if (namesFile && !path.isAbsolute(namesFile)) {
      config.classifier.namesFile = path.resolve(path.dirname(this.configPath), namesFile);
    }
    return config;
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: MergeConfig, user: Record<string, unknown>): MergeConfig {
    const layout = section(user.layout);
    const classifier = section(user.classifier);
    const redirects = section(user.redirects);
    const indexLinks = section(user.indexLinks);
    const execution = section(user.execution);

    return {
      namespaces: readNamespaces(user.namespaces, defaults.namespaces),
      layout: {
        peopleDir: readString(layout.peopleDir, defaults.layout.peopleDir),
        targetDir: readString(layout.targetDir, defaults.layout.targetDir),
        archiveDir: readString(layout.archiveDir, defaults.layout.archiveDir),
        indexDocument: readString(layout.indexDocument, defaults.layout.indexDocument),
        documentExtension: readString(layout.documentExtension, defaults.layout.documentExtension),
      },
      classifier: {
        namesFile: typeof classifier.namesFile === 'string' ? classifier.namesFile : defaults.classifier.namesFile,
      },
      redirects: {
        file: readString(redirects.file, defaults.redirects.file),
      },
      indexLinks: {
        rootIndex: readString(indexLinks.rootIndex, defaults.indexLinks.rootIndex),
        targetEntry: readString(indexLinks.targetEntry, defaults.indexLinks.targetEntry),
        insertBefore: readString(indexLinks.insertBefore, defaults.indexLinks.insertBefore),
        namespaceEntry: readString(indexLinks.namespaceEntry, defaults.indexLinks.namespaceEntry),
        title: readString(indexLinks.title, defaults.indexLinks.title),
      },
      execution: {
        useGit: readBoolean(execution.useGit, defaults.execution.useGit),
        pruneEmptyPeopleDirs: readBoolean(execution.pruneEmptyPeopleDirs, defaults.execution.pruneEmptyPeopleDirs),
      },
      logLevel: isLogLevel(user.logLevel) ? user.logLevel : defaults.logLevel,
    };
  }

  /**
   * Get complete configuration
   */
  getAll(): MergeConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    if (this.loadError) {
      errors.push(this.loadError);
    }

    const names = this.config.namespaces.map(namespace => namespace.name);

    if (names.length === 0) {
      errors.push('At least one namespace must be configured');
    }

    const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
    if (duplicates.length > 0) {
      errors.push(`Duplicate namespace names: ${[...new Set(duplicates)].join(', ')}`);
    }

    if (names.some(name => !name.trim() || name.includes('/'))) {
      errors.push('Namespace names must be non-empty single path segments');
    }

    const { layout } = this.config;
    if (!layout.peopleDir.trim() || !layout.targetDir.trim() || !layout.archiveDir.trim()) {
      errors.push('Layout directories must not be empty');
    }

    if (!layout.documentExtension.startsWith('.')) {
      errors.push('Document extension must start with "."');
    }

    if (names.includes(layout.targetDir)) {
      errors.push(`Target directory "${layout.targetDir}" collides with a namespace`);
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
