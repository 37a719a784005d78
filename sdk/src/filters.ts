import type { Document } from './document';

/** Sentinel meaning "no constraint" for any filter field */
export const ALL = 'All';

export interface FilterPredicateSet {
  year?: string;
  submitter?: string;
  category?: string;
}

export interface FilteredDocument {
  document: Document;
  /** Position in the unfiltered document set */
  index: number;
}

export function isUnconstrained(value: string | undefined): value is undefined | typeof ALL {
  return value === undefined || value === ALL;
}

export function matchesFilters(doc: Document, filters: FilterPredicateSet): boolean {
  const { year, submitter, category } = filters;

  if (!isUnconstrained(year)) {
    if (doc.updateDate === undefined || !doc.updateDate.startsWith(year)) return false;
  }
  if (!isUnconstrained(submitter)) {
    if (doc.submitter !== submitter) return false;
  }
  if (!isUnconstrained(category)) {
    if (!doc.categories.includes(category)) return false;
  }
  return true;
}

/**
 * Apply the conjunction of the given predicates, keeping original order and
 * each survivor's original position.
 */
export function filterDocuments(
  documents: readonly Document[],
  filters: FilterPredicateSet = {}
): FilteredDocument[] {
  const result: FilteredDocument[] = [];
  documents.forEach((document, index) => {
    if (matchesFilters(document, filters)) {
      result.push({ document, index });
    }
  });
  return result;
}
