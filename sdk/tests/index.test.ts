import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Database } from '@tursodatabase/database';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_RESULT_LIMIT } from '../src/config';
import { PaperScout } from '../src/index';
import { MemoryDocumentStore } from '../src/store';
import type { DocumentStore } from '../src/store';
import { graphPaper, mechanicsPaper, quantumPaper } from './fixtures';

describe('PaperScout Integration Tests', () => {
  let scout: PaperScout | undefined;

  afterEach(async () => {
    await scout?.close();
    scout = undefined;
  });

  describe('Initialization', () => {
    it('should open an ephemeral in-memory collection', async () => {
      scout = await PaperScout.open();
      expect(scout).toBeInstanceOf(PaperScout);
      expect(scout.getDatabase()).toBeDefined();
      expect(scout.corpus.documents).toEqual([]);
    });

    it('should build the corpus from a provided store', async () => {
      scout = await PaperScout.open({ store: new MemoryDocumentStore([quantumPaper, mechanicsPaper]) });
      expect(scout.getDatabase()).toBeUndefined();
      expect(scout.documents).toBeUndefined();
      expect(scout.corpus.distinctYears).toEqual(['2019', '2020']);
    });

    it('should wrap store failures', async () => {
      const broken: DocumentStore = {
        fetchAll: async () => {
          throw new Error('connection refused');
        },
      };
      await expect(PaperScout.open({ store: broken })).rejects.toThrow(
        'Failed to load papers: connection refused'
      );
    });
  });

  describe('Failed opening', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'paperscout-open-'));
    });

    afterEach(() => {
      vi.restoreAllMocks();
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should close its database when the paper table cannot be set up', async () => {
      const dbPath = join(tempDir, 'legacy.db');
      const legacy = new Database(dbPath);
      await legacy.connect();
      // No update_date column, so the year index cannot be created
      await legacy.exec(`CREATE TABLE papers (id TEXT PRIMARY KEY, title TEXT)`);
      await legacy.close();

      const close = vi.spyOn(Database.prototype, 'close');
      await expect(PaperScout.open({ dbPath })).rejects.toThrow();
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should leave nothing open when the database opens cleanly', async () => {
      const close = vi.spyOn(Database.prototype, 'close');
      scout = await PaperScout.open({ dbPath: join(tempDir, 'fresh.db') });
      expect(close).not.toHaveBeenCalled();

      await scout.close();
      scout = undefined;
      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  describe('Searching', () => {
    it('should search the current snapshot', async () => {
      scout = await PaperScout.open({ store: new MemoryDocumentStore([quantumPaper, mechanicsPaper]) });
      const results = scout.search('quantum');
      expect(results.map(({ document }) => document.id)).toEqual(['p-quantum', 'p-mechanics']);
    });

    it('should apply filters and explicit limits', async () => {
      scout = await PaperScout.open({ store: new MemoryDocumentStore([quantumPaper, mechanicsPaper, graphPaper]) });
      expect(scout.search('quantum', { year: '2019' })).toHaveLength(1);
      expect(scout.search('quantum', {}, 1)).toHaveLength(1);
    });

    it('should return up to DEFAULT_RESULT_LIMIT results without a configured limit', async () => {
      const copies = Array.from({ length: DEFAULT_RESULT_LIMIT + 10 }, (_, i) => ({ ...quantumPaper, id: `copy-${i}` }));
      scout = await PaperScout.open({ store: new MemoryDocumentStore(copies) });
      expect(scout.search('quantum')).toHaveLength(DEFAULT_RESULT_LIMIT);
    });

    it('should use the configured default limit', async () => {
      const copies = Array.from({ length: 4 }, (_, i) => ({ ...quantumPaper, id: `copy-${i}` }));
      scout = await PaperScout.open({ store: new MemoryDocumentStore(copies), limit: 3 });
      expect(scout.search('quantum')).toHaveLength(3);
    });

    it('should expose filter options', async () => {
      scout = await PaperScout.open({ store: new MemoryDocumentStore([quantumPaper, graphPaper]) });
      expect(scout.filterOptions().submitters).toEqual(['All', 'alice', 'carol']);
    });
  });

  describe('Refreshing', () => {
    it('should swap in a new snapshot and leave the old one untouched', async () => {
      const store = new MemoryDocumentStore([quantumPaper]);
      scout = await PaperScout.open({ store });
      const before = scout.corpus;

      store.add(mechanicsPaper);
      const after = await scout.refresh();

      expect(before.documents).toHaveLength(1);
      expect(after.documents).toHaveLength(2);
      expect(scout.corpus).toBe(after);
    });

    it('should keep the previous snapshot when a refresh fails', async () => {
      let fail = false;
      const store: DocumentStore = {
        fetchAll: async () => {
          if (fail) throw new Error('store offline');
          return [quantumPaper];
        },
      };
      scout = await PaperScout.open({ store });
      const before = scout.corpus;

      fail = true;
      await expect(scout.refresh()).rejects.toThrow('store offline');
      expect(scout.corpus).toBe(before);
    });

    it('should pick up papers seeded into its own database', async () => {
      scout = await PaperScout.open();
      await scout.documents?.insertMany([quantumPaper, graphPaper]);
      await scout.refresh();

      expect(scout.search('graph', {}, 1).map(({ document }) => document.id)).toEqual(['p-graph']);
    });
  });

  describe('Sessions', () => {
    it('should persist selections in its own database', async () => {
      scout = await PaperScout.open();
      const sessions = scout.sessions;
      expect(sessions).toBeDefined();
      if (!sessions) return;

      const session = await sessions.load('reader');
      session.appendSelection(quantumPaper);
      await sessions.save('reader', session);

      expect((await sessions.load('reader')).listSelections()).toEqual([quantumPaper]);
    });
  });
});
