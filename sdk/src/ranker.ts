import type { Document } from './document';
import { partialRatioScorer } from './similarity';

export interface RankedDocument {
  document: Document;
  /** Partial-ratio similarity in [0, 100] */
  score: number;
  /** Position within the candidate list that was ranked */
  index: number;
}

/**
 * Score every candidate against the query and keep the `limit` best.
 * Equal scores keep their candidate order, so an unchanged corpus always
 * yields the same ranking.
 */
export function rankDocuments(
  query: string,
  candidateTexts: readonly string[],
  candidateDocuments: readonly Document[],
  limit: number
): RankedDocument[] {
  if (candidateTexts.length !== candidateDocuments.length) {
    throw new Error(
      `Candidate texts (${candidateTexts.length}) and documents (${candidateDocuments.length}) are not aligned`
    );
  }
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }
  if (limit === 0 || candidateDocuments.length === 0) {
    return [];
  }

  const score = partialRatioScorer(query);
  const scored = candidateDocuments.map((document, index) => ({
    document,
    score: score(candidateTexts[index]),
    index,
  }));

  scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    return a.index - b.index;
  });
  return scored.slice(0, limit);
}
