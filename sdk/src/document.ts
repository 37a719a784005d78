import { z } from 'zod';

const optionalText = z
  .unknown()
  .transform((value) => (typeof value === 'string' ? value : undefined));

const requiredText = z
  .unknown()
  .transform((value) => (typeof value === 'string' ? value : ''));

// Stores hand back either a tag array or the arXiv-style "hep-th math-ph" string
const categoryList = z.unknown().transform((value): string[] => {
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === 'string');
  }
  return [];
});

export const documentSchema = z.object({
  id: z.string().min(1),
  title: requiredText,
  abstract: requiredText,
  categories: categoryList,
  submitter: optionalText,
  updateDate: optionalText,
  comments: optionalText,
  journalRef: optionalText,
  authors: optionalText,
  link: optionalText,
});

export type Document = z.infer<typeof documentSchema>;

/**
 * Validate a raw record coming out of a document store.
 * Only a missing id is fatal; every other field falls back to its default.
 */
export function parseDocument(raw: unknown): Document {
  return documentSchema.parse(raw);
}

export function safeParseDocument(raw: unknown): Document | undefined {
  const parsed = documentSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export const UNKNOWN = 'Unknown';

export function documentYear(doc: Document): string | undefined {
  return doc.updateDate ? doc.updateDate.slice(0, 4) : undefined;
}

export function displaySubmitter(doc: Document): string {
  return doc.submitter || UNKNOWN;
}

export function displayYear(doc: Document): string {
  return documentYear(doc) ?? UNKNOWN;
}

export function displayCategories(doc: Document): string {
  return doc.categories.join(', ');
}
