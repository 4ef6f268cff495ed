/**
 * Person detection for people entries of uncurated namespaces.
 *
 * The curated name sets live in data/non-person-names.json; everything else
 * is a structural guess made from the identity key alone.
 */

import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { AppError, errorMessage } from './logger.js';
import { isRecord, type NamespaceConfig } from './config.js';
import type { Classification, EntryGroup, NamespaceClassification, Relocation } from './types.js';

export interface NonPersonNames {
  /** Directory names known to hold non-person content */
  nonPersonDirectories: string[];
  /** Project, topic and tool names that look like people */
  exactExclusions: string[];
  /** CamelCase names that are not people */
  camelCaseExclusions: string[];
  /** Keys with a dot that start with one of these are generic pages */
  genericDotPrefixes: string[];
}

const DISPLAY_NAME = /^[A-Z][a-z]+(?:[-'][A-Za-z]+)* [A-Z][a-z]+.*$/;
const CAMEL_CASE_NAME = /^(?:[A-Z][a-z]+){2,}$/;
const USERNAME = /^[a-z][a-z0-9._]+$/;
const MAX_USERNAME_LENGTH = 25;

const NAMES_FILE_CANDIDATES = [
  '../data/non-person-names.json',
  '../../data/non-person-names.json',
];

/**
 * Locates the bundled name sets beside the sources or beside the build output
 */
export function defaultNamesFile(): string {
  const candidates = NAMES_FILE_CANDIDATES.map(candidate => fileURLToPath(new URL(candidate, import.meta.url)));
  return candidates.find(candidate => existsSync(candidate)) ?? candidates[0];
}

function readStringList(payload: Record<string, unknown>, field: keyof NonPersonNames, filePath: string): string[] {
  const value = payload[field];
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new AppError(
      `Classifier data field "${field}" must be a list of strings`,
      'CLASSIFIER_DATA_INVALID',
      { path: filePath, field }
    );
  }
  return value;
}

export function loadNonPersonNames(filePath: string = defaultNamesFile()): NonPersonNames {
  if (!existsSync(filePath)) {
    throw new AppError(`Classifier data not found: ${filePath}`, 'CLASSIFIER_DATA_INVALID', { path: filePath });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new AppError(
      `Classifier data is not valid JSON: ${errorMessage(error)}`,
      'CLASSIFIER_DATA_INVALID',
      { path: filePath }
    );
  }

  if (!isRecord(payload)) {
    throw new AppError('Classifier data must be a JSON object', 'CLASSIFIER_DATA_INVALID', { path: filePath });
  }

  return {
    nonPersonDirectories: readStringList(payload, 'nonPersonDirectories', filePath),
    exactExclusions: readStringList(payload, 'exactExclusions', filePath),
    camelCaseExclusions: readStringList(payload, 'camelCaseExclusions', filePath),
    genericDotPrefixes: readStringList(payload, 'genericDotPrefixes', filePath),
  };
}

export class PersonClassifier {
  private readonly nonPersonDirectories: Set<string>;
  private readonly exactExclusions: Set<string>;
  private readonly camelCaseExclusions: Set<string>;
  private readonly genericDotPrefixes: string[];

  constructor(names: NonPersonNames) {
    this.nonPersonDirectories = new Set(names.nonPersonDirectories);
    this.exactExclusions = new Set(names.exactExclusions);
    this.camelCaseExclusions = new Set(names.camelCaseExclusions);
    this.genericDotPrefixes = [...names.genericDotPrefixes];
  }

  static fromFile(filePath?: string): PersonClassifier {
    return new PersonClassifier(loadNonPersonNames(filePath));
  }

  /**
   * Exclusion sets always win over the shape heuristics.
   */
  classify(key: string): Classification {
    if (this.nonPersonDirectories.has(key)) {
      return 'non_person';
    }

    if (this.isExcluded(key)) {
      return 'non_person';
    }

    return this.looksLikePerson(key) ? 'person' : 'non_person';
  }

  isExcluded(key: string): boolean {
    return this.exactExclusions.has(key) || this.camelCaseExclusions.has(key);
  }

  looksLikePerson(key: string): boolean {
    if (DISPLAY_NAME.test(key)) {
      return true;
    }

    if (CAMEL_CASE_NAME.test(key)) {
      if (this.camelCaseExclusions.has(key)) {
        return false;
      }
      const capitals = key.match(/[A-Z]/g) ?? [];
      if (capitals.length === 2) {
        return true;
      }
      const parts = key.match(/[A-Z][a-z]+/g) ?? [];
      return parts.length >= 2 && parts.every(part => part.length >= 2);
    }

    // psf-style usernames
    if (USERNAME.test(key) && key.length < MAX_USERNAME_LENGTH) {
      return true;
    }

    // "Casper.dcl"
    if (key.includes('.') && !this.genericDotPrefixes.some(prefix => key.startsWith(prefix))) {
      return true;
    }

    return false;
  }
}

/**
 * Splits one namespace's entries into persons, non-persons and keys with a
 * configured destination. Curated namespaces skip the classifier.
 */
export function classifyNamespace(
  namespace: NamespaceConfig,
  group: EntryGroup,
  classifier: PersonClassifier,
): NamespaceClassification {
  const persons: EntryGroup = new Map();
  const nonPersons: EntryGroup = new Map();
  const relocations = new Map<string, Relocation>();
  const relocationTable = namespace.relocations ?? {};

  for (const [key, nodes] of group) {
    if (Object.hasOwn(relocationTable, key)) {
      relocations.set(key, { nodes, destination: relocationTable[key] });
      continue;
    }

    if (namespace.curated || classifier.classify(key) === 'person') {
      persons.set(key, nodes);
    } else {
      nonPersons.set(key, nodes);
    }
  }

  return {
    namespace: namespace.name,
    curated: namespace.curated,
    persons,
    nonPersons,
    relocations,
  };
}
