import type { Database } from '@tursodatabase/database';
import { ensureConnected } from '../connection';
import { Document, safeParseDocument } from '../document';
import type { DocumentStore } from '../store';

function decodeCategories(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    // Older rows hold the raw "cs.IR cs.LG" form; the schema splits it
    return value;
  }
}

function rowToDocument(row: unknown): Document | undefined {
  if (typeof row !== 'object' || row === null) return undefined;
  const record: Record<string, unknown> = { ...row };
  return safeParseDocument({
    id: record.id,
    title: record.title,
    abstract: record.abstract,
    categories: decodeCategories(record.categories),
    submitter: record.submitter,
    updateDate: record.update_date,
    comments: record.comments,
    journalRef: record.journal_ref,
    authors: record.authors,
    link: record.link,
  });
}

/**
 * Paper collection kept in an embedded Turso database
 */
export class TursoDocumentStore implements DocumentStore {
  private db: Database;
  private initialized: Promise<void>;

  constructor(db: Database) {
    this.db = db;
    this.initialized = this.initialize();
  }

  private async initialize(): Promise<void> {
    await ensureConnected(this.db);

    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS papers (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL DEFAULT '',
        abstract TEXT NOT NULL DEFAULT '',
        categories TEXT NOT NULL DEFAULT '[]',
        submitter TEXT,
        update_date TEXT,
        comments TEXT,
        journal_ref TEXT,
        authors TEXT,
        link TEXT
      )
    `);

    // Year filters read update_date prefixes
    await this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_papers_update_date
      ON papers(update_date)
    `);
  }

  /**
   * Insert or replace papers, keyed by id
   * Returns the number of papers written
   */
  async insertMany(documents: readonly Document[]): Promise<number> {
    await this.initialized;

    const stmt = this.db.prepare(`
      INSERT INTO papers (id, title, abstract, categories, submitter, update_date, comments, journal_ref, authors, link)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title,
        abstract = excluded.abstract,
        categories = excluded.categories,
        submitter = excluded.submitter,
        update_date = excluded.update_date,
        comments = excluded.comments,
        journal_ref = excluded.journal_ref,
        authors = excluded.authors,
        link = excluded.link
    `);

    await this.db.exec('BEGIN');
    try {
      for (const doc of documents) {
        await stmt.run(
          doc.id,
          doc.title,
          doc.abstract,
          JSON.stringify(doc.categories),
          doc.submitter ?? null,
          doc.updateDate ?? null,
          doc.comments ?? null,
          doc.journalRef ?? null,
          doc.authors ?? null,
          doc.link ?? null
        );
      }
      await this.db.exec('COMMIT');
    } catch (error) {
      await this.db.exec('ROLLBACK');
      throw error;
    }

    return documents.length;
  }

  async fetchAll(): Promise<Document[]> {
    await this.initialized;

    const stmt = this.db.prepare(`
      SELECT id, title, abstract, categories, submitter, update_date, comments, journal_ref, authors, link
      FROM papers
      ORDER BY rowid
    `);
    const rows: unknown = await stmt.all();
    if (!Array.isArray(rows)) return [];

    const documents: Document[] = [];
    for (const row of rows) {
      const doc = rowToDocument(row);
      if (doc) {
        documents.push(doc);
      } else {
        console.warn('Skipping paper row without a usable id');
      }
    }
    return documents;
  }

  async count(): Promise<number> {
    await this.initialized;

    const stmt = this.db.prepare(`SELECT COUNT(*) AS total FROM papers`);
    const row: unknown = await stmt.get();
    if (typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number') {
      return row.total;
    }
    return 0;
  }

  /**
   * Wait for initialization to complete
   */
  async ready(): Promise<void> {
    await this.initialized;
  }
}
