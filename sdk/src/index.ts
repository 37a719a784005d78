import { Database } from '@tursodatabase/database';
import { existsSync, mkdirSync } from 'fs';
import { buildCorpusIndex, CorpusIndex, filterOptions, FilterOptions } from './corpus';
import { PaperScoutConfig, resolveConfig } from './config';
import type { FilterPredicateSet } from './filters';
import { TursoDocumentStore } from './providers/turso';
import { search, SearchResult } from './search';
import { SessionStore } from './session';
import type { DocumentStore } from './store';

/**
 * Options for opening a PaperScout instance
 */
export interface PaperScoutOptions extends PaperScoutConfig {
  /**
   * Where papers come from.
   * - If provided: the store is used as-is and no database is opened
   * - If omitted: papers live in the Turso database chosen by `id`/`dbPath`
   */
  store?: DocumentStore;
}

async function loadCorpus(store: DocumentStore): Promise<CorpusIndex> {
  try {
    return buildCorpusIndex(await store.fetchAll());
  } catch (error) {
    throw new Error(
      `Failed to load papers: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

export class PaperScout {
  private db?: Database;
  private snapshot: CorpusIndex;
  private readonly store: DocumentStore;
  private readonly limit: number;

  /** Paper table of the owned database, when PaperScout opened one */
  public readonly documents?: TursoDocumentStore;
  /** Saved sessions, when PaperScout opened a database */
  public readonly sessions?: SessionStore;

  /**
   * Private constructor - use PaperScout.open() instead
   */
  private constructor(
    store: DocumentStore,
    snapshot: CorpusIndex,
    limit: number,
    db?: Database,
    documents?: TursoDocumentStore,
    sessions?: SessionStore
  ) {
    this.store = store;
    this.snapshot = snapshot;
    this.limit = limit;
    this.db = db;
    this.documents = documents;
    this.sessions = sessions;
  }

  /**
   * Open a paper collection and build its first corpus snapshot
   * @example
   * ```typescript
   * // Persistent collection: .paperscout/arxiv.db
   * const scout = await PaperScout.open({ id: 'arxiv' });
   *
   * // Any other source of papers
   * const scout = await PaperScout.open({ store: new MemoryDocumentStore(papers) });
   * ```
   */
  static async open(options: PaperScoutOptions = {}): Promise<PaperScout> {
    const { store, ...config } = options;
    const resolved = resolveConfig(config);

    if (store) {
      return new PaperScout(store, await loadCorpus(store), resolved.limit);
    }

    if (resolved.dataDir && !existsSync(resolved.dataDir)) {
      mkdirSync(resolved.dataDir, { recursive: true });
    }

    const db = new Database(resolved.dbPath);
    await db.connect();

    try {
      // One store at a time, so no statement is in flight if the handle closes
      const documents = new TursoDocumentStore(db);
      await documents.ready();
      const sessions = new SessionStore(db);
      await sessions.ready();

      return new PaperScout(documents, await loadCorpus(documents), resolved.limit, db, documents, sessions);
    } catch (error) {
      // Nothing else holds this handle yet
      await db.close();
      throw error;
    }
  }

  /**
   * Current corpus snapshot. It is never mutated; refresh() swaps in a new one.
   */
  get corpus(): CorpusIndex {
    return this.snapshot;
  }

  /**
   * Re-read the store and replace the snapshot.
   * If loading fails the previous snapshot stays in place.
   */
  async refresh(): Promise<CorpusIndex> {
    this.snapshot = await loadCorpus(this.store);
    return this.snapshot;
  }

  search(query: string, filters: FilterPredicateSet = {}, limit: number = this.limit): SearchResult[] {
    return search(this.snapshot, filters, query, limit);
  }

  filterOptions(): FilterOptions {
    return filterOptions(this.snapshot);
  }

  /**
   * Get the underlying Database instance, if PaperScout opened one
   */
  getDatabase(): Database | undefined {
    return this.db;
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = undefined;
    }
  }
}

export { buildCorpusIndex, filterOptions, searchableText } from './corpus';
export type { CorpusIndex, FilterOptions } from './corpus';
export { resolveConfig, DEFAULT_RESULT_LIMIT } from './config';
export type { PaperScoutConfig, ResolvedConfig } from './config';
export {
  documentSchema,
  parseDocument,
  safeParseDocument,
  displaySubmitter,
  displayYear,
  displayCategories,
  UNKNOWN,
} from './document';
export type { Document } from './document';
export { ALL, filterDocuments, matchesFilters, isUnconstrained } from './filters';
export type { FilterPredicateSet, FilteredDocument } from './filters';
export { rankDocuments } from './ranker';
export type { RankedDocument } from './ranker';
export { search, corpusFor, DEFAULT_LIMIT } from './search';
export type { SearchResult } from './search';
export { SelectionSet } from './selections';
export { Session, SessionStore } from './session';
export type { Page, SessionState } from './session';
export { partialRatio, partialRatioScorer } from './similarity';
export type { Scorer } from './similarity';
export { MemoryDocumentStore } from './store';
export type { DocumentStore } from './store';
export { TursoDocumentStore } from './providers/turso';
