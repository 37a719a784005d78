import { Document, documentYear } from './document';
import { ALL } from './filters';

/**
 * Immutable snapshot of a document set and everything derived from it.
 * Rebuild with buildCorpusIndex() when the documents change; never mutate.
 */
export interface CorpusIndex {
  readonly documents: readonly Document[];
  /** title + abstract + categories, aligned with `documents` */
  readonly searchableTexts: readonly string[];
  readonly distinctYears: readonly string[];
  readonly distinctSubmitters: readonly string[];
  readonly distinctCategories: readonly string[];
}

export interface FilterOptions {
  years: string[];
  submitters: string[];
  categories: string[];
}

export function searchableText(doc: Document): string {
  return `${doc.title} ${doc.abstract} ${doc.categories.join(' ')}`;
}

function sortedDistinct(values: Iterable<string>): readonly string[] {
  return Object.freeze(Array.from(new Set(values)).sort());
}

export function buildCorpusIndex(documents: readonly Document[]): CorpusIndex {
  const snapshot = Object.freeze([...documents]);
  const searchableTexts = snapshot.map(searchableText);

  const years: string[] = [];
  const submitters: string[] = [];
  const categories: string[] = [];
  for (const doc of snapshot) {
    if (doc.submitter) submitters.push(doc.submitter);
    categories.push(...doc.categories);
    const year = documentYear(doc);
    if (year) years.push(year);
  }

  return Object.freeze({
    documents: snapshot,
    searchableTexts: Object.freeze(searchableTexts),
    distinctYears: sortedDistinct(years),
    distinctSubmitters: sortedDistinct(submitters),
    distinctCategories: sortedDistinct(categories),
  });
}

// A literal "All" in the data already means "unconstrained" to the filters
function withSentinel(values: readonly string[]): string[] {
  return [ALL, ...values.filter((value) => value !== ALL)];
}

/**
 * Choice lists for filter widgets, each led by the "All" sentinel.
 */
export function filterOptions(corpus: CorpusIndex): FilterOptions {
  return {
    years: withSentinel(corpus.distinctYears),
    submitters: withSentinel(corpus.distinctSubmitters),
    categories: withSentinel(corpus.distinctCategories),
  };
}
