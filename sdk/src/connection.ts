import type { Database } from '@tursodatabase/database';

/**
 * Connect a database that may already be connected, as happens when several
 * stores share one handle.
 */
export async function ensureConnected(db: Database): Promise<void> {
  try {
    await db.connect();
  } catch (error) {
    // Ignore "already connected" errors
    if (!(error instanceof Error) || !error.message.includes('already')) {
      throw error;
    }
  }
}
