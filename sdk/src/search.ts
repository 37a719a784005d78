import { buildCorpusIndex, CorpusIndex } from './corpus';
import type { Document } from './document';
import { filterDocuments, FilterPredicateSet } from './filters';
import { rankDocuments, RankedDocument } from './ranker';

/**
 * Result count of the standalone `search()` when no limit is passed.
 * `PaperScout#search` uses its configured limit instead (see DEFAULT_RESULT_LIMIT).
 */
export const DEFAULT_LIMIT = 5;

export interface SearchResult {
  document: Document;
  score: number;
  /** Position of the document in the corpus snapshot */
  index: number;
}

const indexCache = new WeakMap<readonly Document[], CorpusIndex>();

function isCorpusIndex(source: CorpusIndex | readonly Document[]): source is CorpusIndex {
  return !Array.isArray(source);
}

/**
 * Corpus index for a document array, built once per array instance.
 * Callers replace the array (rather than mutate it) when documents change.
 */
export function corpusFor(source: CorpusIndex | readonly Document[]): CorpusIndex {
  if (isCorpusIndex(source)) return source;
  let corpus = indexCache.get(source);
  if (!corpus) {
    corpus = buildCorpusIndex(source);
    indexCache.set(source, corpus);
  }
  return corpus;
}

/**
 * Filter the corpus, then rank the survivors against the query.
 * An empty query performs no search and yields no results.
 */
export function search(
  source: CorpusIndex | readonly Document[],
  filters: FilterPredicateSet,
  query: string,
  limit: number = DEFAULT_LIMIT
): SearchResult[] {
  if (query === '') {
    return [];
  }

  const corpus = corpusFor(source);
  const candidates = filterDocuments(corpus.documents, filters);
  const ranked: RankedDocument[] = rankDocuments(
    query,
    candidates.map(({ index }) => corpus.searchableTexts[index]),
    candidates.map(({ document }) => document),
    limit
  );

  return ranked.map(({ document, score, index }) => ({
    document,
    score,
    index: candidates[index].index,
  }));
}
