import { readFileSync } from 'fs';
import { z } from 'zod';
import { parseDocument, type Document } from 'paperscout-sdk';

// Field names as they appear in arXiv metadata dumps
const paperRecordSchema = z
  .object({
    _id: z.union([z.string(), z.object({ $oid: z.string() })]).optional(),
    id: z.union([z.string(), z.number()]).optional(),
    title: z.unknown(),
    abstract: z.unknown(),
    categories: z.unknown(),
    submitter: z.unknown(),
    update_date: z.unknown(),
    comments: z.unknown(),
    'journal-ref': z.unknown(),
    journal_ref: z.unknown(),
    authors: z.unknown(),
    link: z.unknown(),
  })
  .transform((record, ctx) => {
    const rawId = typeof record._id === 'object' ? record._id.$oid : record._id ?? record.id;
    if (rawId === undefined || rawId === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'record has neither _id nor id' });
      return z.NEVER;
    }
    return parseDocument({
      id: String(rawId),
      title: record.title,
      abstract: record.abstract,
      categories: record.categories,
      submitter: record.submitter,
      updateDate: record.update_date,
      comments: record.comments,
      journalRef: record.journal_ref ?? record['journal-ref'],
      authors: record.authors,
      link: record.link,
    });
  });

export function parseRecords(raw: unknown): Document[] {
  if (!Array.isArray(raw)) {
    throw new Error('Expected a JSON array of paper records');
  }
  return raw.map((record, i) => {
    const parsed = paperRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new Error(`Record ${i}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    return parsed.data;
  });
}

export function loadRecords(path: string): Document[] {
  const text = readFileSync(path, 'utf8');
  return parseRecords(JSON.parse(text));
}
