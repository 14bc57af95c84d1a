/**
 * Filter pipeline: predicates that exclude duplicate candidates from review.
 * A predicate returns true to EXCLUDE the candidate.
 */

import { ConfigurationError } from './errors.js';
import type { DuplicateCandidate } from './types.js';

export type FilterPredicate = (candidate: DuplicateCandidate) => boolean;

export interface NamedFilter {
  name: string;
  description: string;
  excludes: FilterPredicate;
}

const CAD_SUPPORT_EXTENSIONS = ['.shx', '.lin', '.pat', '.pcx'];
const SYSTEM_FILES = new Set(['thumbs.db', '.ds_store', 'desktop.ini']);

export const excludeCadSupportFiles: FilterPredicate = (candidate) => {
  const filename = candidate.filename.toLowerCase();
  return CAD_SUPPORT_EXTENSIONS.some(ext => filename.endsWith(ext));
};

export const excludeSystemFiles: FilterPredicate = (candidate) =>
  SYSTEM_FILES.has(candidate.filename.toLowerCase());

export const FILTER_REGISTRY: readonly NamedFilter[] = [
  {
    name: 'exclude-cad-support-files',
    description: 'CAD fonts, linetypes and hatch patterns, which are duplicated on purpose',
    excludes: excludeCadSupportFiles
  },
  {
    name: 'exclude-system-files',
    description: 'OS-generated thumbnails and folder metadata',
    excludes: excludeSystemFiles
  }
];

export function isKnownFilter(name: string): boolean {
  return FILTER_REGISTRY.some(filter => filter.name === name);
}

/**
 * Resolve configured filter names to predicates, in the configured order.
 */
export function resolveFilters(names: readonly string[]): FilterPredicate[] {
  const unknown = names.filter(name => !isKnownFilter(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(unknown.map(name => `Unknown filter "${name}"`));
  }
  return names.map(name => {
    const match = FILTER_REGISTRY.find(filter => filter.name === name);
    if (!match) {
      throw new ConfigurationError([`Unknown filter "${name}"`]);
    }
    return match.excludes;
  });
}

export class FilterPipeline {
  private readonly predicates: readonly FilterPredicate[];

  constructor(predicates: readonly FilterPredicate[] = []) {
    this.predicates = [...predicates];
  }

  static fromNames(names: readonly string[]): FilterPipeline {
    return new FilterPipeline(resolveFilters(names));
  }

  get size(): number {
    return this.predicates.length;
  }

  excludes(candidate: DuplicateCandidate): boolean {
    return this.predicates.some(predicate => predicate(candidate));
  }

  apply(candidates: readonly DuplicateCandidate[]): DuplicateCandidate[] {
    return candidates.filter(candidate => !this.excludes(candidate));
  }
}
