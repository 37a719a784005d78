import type { Database } from '@tursodatabase/database';
import { z } from 'zod';
import { ensureConnected } from './connection';
import { Document, documentSchema } from './document';
import { SelectionSet } from './selections';

/**
 * Screens of the interactive shell: search results, or the saved-papers list
 */
export type Page = 'home' | 'selected';

const sessionStateSchema = z.object({
  page: z.enum(['home', 'selected']).catch('home'),
  selections: z.array(documentSchema).catch([]),
});

// Malformed JSON fails the schema like any other unreadable state
function decodeState(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export type SessionState = {
  page: Page;
  selections: Document[];
};

/**
 * Per-user interaction state. Owned by the shell; the retrieval core never
 * reads it.
 */
export class Session {
  private currentPage: Page;
  private selections: SelectionSet;

  constructor(state?: Partial<SessionState>) {
    this.currentPage = state?.page ?? 'home';
    this.selections = new SelectionSet(state?.selections);
  }

  get page(): Page {
    return this.currentPage;
  }

  goto(page: Page): void {
    this.currentPage = page;
  }

  appendSelection(document: Document): void {
    this.selections.append(document);
  }

  listSelections(): Document[] {
    return this.selections.all();
  }

  toJSON(): SessionState {
    return { page: this.currentPage, selections: this.selections.all() };
  }
}

/**
 * Sessions persisted as JSON in the same database as the papers
 */
export class SessionStore {
  private db: Database;
  private initialized: Promise<void>;

  constructor(db: Database) {
    this.db = db;
    this.initialized = this.initialize();
  }

  private async initialize(): Promise<void> {
    await ensureConnected(this.db);

    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        created_at INTEGER DEFAULT (unixepoch()),
        updated_at INTEGER DEFAULT (unixepoch())
      )
    `);
  }

  async save(id: string, session: Session): Promise<void> {
    await this.initialized;

    const stmt = this.db.prepare(`
      INSERT INTO sessions (id, state, updated_at)
      VALUES (?, ?, unixepoch())
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state,
        updated_at = unixepoch()
    `);

    await stmt.run(id, JSON.stringify(session));
  }

  /**
   * Load a saved session, or start a fresh one when none exists
   */
  async load(id: string): Promise<Session> {
    await this.initialized;

    const stmt = this.db.prepare(`SELECT state FROM sessions WHERE id = ?`);
    const row: unknown = await stmt.get(id);

    if (typeof row !== 'object' || row === null || !('state' in row) || typeof row.state !== 'string') {
      return new Session();
    }

    const parsed = sessionStateSchema.safeParse(decodeState(row.state));
    if (!parsed.success) {
      console.warn(`Discarding unreadable state for session '${id}'`);
      return new Session();
    }
    return new Session(parsed.data);
  }

  async delete(id: string): Promise<void> {
    await this.initialized;

    const stmt = this.db.prepare(`DELETE FROM sessions WHERE id = ?`);
    await stmt.run(id);
  }

  /**
   * Wait for initialization to complete
   */
  async ready(): Promise<void> {
    await this.initialized;
  }
}
