/**
 * Result count of `PaperScout#search` when neither the options nor
 * PAPERSCOUT_RESULT_LIMIT set one. The standalone `search()` defaults to DEFAULT_LIMIT.
 */
export const DEFAULT_RESULT_LIMIT = 50;
export const DATA_DIR = '.paperscout';

/**
 * Configuration for opening a PaperScout instance.
 * Every field is optional, with fallbacks from environment variables.
 */
export interface PaperScoutConfig {
  /**
   * Identifier of a persistent collection
   * - If provided: database at `.paperscout/{id}.db`
   * - If omitted: ephemeral in-memory database
   * Default: process.env.PAPERSCOUT_ID
   */
  id?: string;

  /**
   * Explicit database path, taking precedence over `id`
   * Default: process.env.PAPERSCOUT_DB_PATH
   */
  dbPath?: string;

  /**
   * Default number of results returned by PaperScout#search()
   * Default: process.env.PAPERSCOUT_RESULT_LIMIT || 50
   */
  limit?: number;
}

export interface ResolvedConfig {
  dbPath: string;
  /** Directory that must exist before the database file is opened */
  dataDir?: string;
  limit: number;
}

function parseLimit(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`PAPERSCOUT_RESULT_LIMIT must be a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Resolve config with precedence: explicit > env > defaults
 */
export function resolveConfig(
  config: PaperScoutConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const limit =
    config.limit ?? (env.PAPERSCOUT_RESULT_LIMIT ? parseLimit(env.PAPERSCOUT_RESULT_LIMIT) : DEFAULT_RESULT_LIMIT);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`limit must be a positive integer, got ${limit}`);
  }

  const dbPath = config.dbPath || env.PAPERSCOUT_DB_PATH;
  if (dbPath) {
    return { dbPath, limit };
  }

  const id = config.id || env.PAPERSCOUT_ID;
  if (!id) {
    return { dbPath: ':memory:', limit };
  }
  return { dbPath: `${DATA_DIR}/${id}.db`, dataDir: DATA_DIR, limit };
}
