import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CommitAnalysis } from '../model/analysis.js';
import { commitAnalysisSchema } from '../model/analysis.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { CacheIOError, errorMessage } from '../errors.js';
import { SCHEMA_DDL, SCHEMA_VERSION } from './schema.js';

/** What the analyzer needs from a cache. */
export interface AnalysisStore {
  get(commitId: string): CommitAnalysis | undefined;
  put(commitId: string, analysis: CommitAnalysis): void;
}

export interface CacheOptions {
  logger?: Logger;
  /** Analysis settings fingerprint; a different stored value clears the cache. */
  fingerprint?: string;
}

/**
 * Durable commitId → CommitAnalysis store on SQLite.
 *
 * Failures never reach the caller: the first one is logged and the cache
 * turns itself off, after which reads miss and writes are dropped.
 */
export class CommitCache implements AnalysisStore {
  private db: Database.Database | undefined;

  private constructor(
    db: Database.Database | undefined,
    readonly path: string,
    private readonly logger: Logger,
  ) {
    this.db = db;
  }

  static open(path: string, options: CacheOptions = {}): CommitCache {
    const logger = options.logger ?? silentLogger;
    let db: Database.Database | undefined;

    try {
      if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
      db = new Database(path);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.exec(SCHEMA_DDL);
      const cache = new CommitCache(db, path, logger);
      cache.checkVersion(options.fingerprint);
      return cache;
    } catch (err) {
      logger.warn(`${new CacheIOError('open', path, err).message}; continuing without cache`);
      closeQuietly(db, logger);
      return new CommitCache(undefined, path, logger);
    }
  }

  /** A cache that stores nothing, for runs with caching turned off. */
  static disabled(): CommitCache {
    return new CommitCache(undefined, ':disabled:', silentLogger);
  }

  get enabled(): boolean {
    return this.db !== undefined;
  }

  get(commitId: string): CommitAnalysis | undefined {
    const db = this.db;
    if (!db) return undefined;

    let raw: string | undefined;
    try {
      raw = db
        .prepare<[string], { analysis: string }>('SELECT analysis FROM commit_analyses WHERE commit_id = ?')
        .get(commitId)?.analysis;
    } catch (err) {
      this.fail('read', err);
      return undefined;
    }
    if (raw === undefined) return undefined;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`ignoring unreadable cache entry: ${errorMessage(err)}`, { commit: commitId });
      return undefined;
    }

    const parsed = commitAnalysisSchema.safeParse(value);
    if (!parsed.success || parsed.data.id !== commitId) {
      this.logger.warn('ignoring malformed cache entry', { commit: commitId });
      return undefined;
    }
    return parsed.data;
  }

  put(commitId: string, analysis: CommitAnalysis): void {
    const db = this.db;
    if (!db) return;

    try {
      const insert = db.prepare<[string, string]>(
        'INSERT OR REPLACE INTO commit_analyses (commit_id, analysis) VALUES (?, ?)',
      );
      db.transaction((id: string, json: string) => {
        insert.run(id, json);
      })(commitId, JSON.stringify(analysis));
    } catch (err) {
      this.fail('write', err);
    }
  }

  has(commitId: string): boolean {
    const db = this.db;
    if (!db) return false;
    try {
      return db.prepare<[string], { one: number }>('SELECT 1 AS one FROM commit_analyses WHERE commit_id = ?').get(commitId) !== undefined;
    } catch (err) {
      this.fail('read', err);
      return false;
    }
  }

  /** Removes entries whose id starts with `commitId`. Returns how many went. */
  invalidate(commitId: string): number {
    const db = this.db;
    if (!db || commitId === '') return 0;
    try {
      return db
        .prepare<[string, string]>('DELETE FROM commit_analyses WHERE substr(commit_id, 1, length(?)) = ?')
        .run(commitId, commitId).changes;
    } catch (err) {
      this.fail('write', err);
      return 0;
    }
  }

  /** Removes every entry. Returns how many there were. */
  clear(): number {
    const db = this.db;
    if (!db) return 0;
    try {
      return db.prepare('DELETE FROM commit_analyses').run().changes;
    } catch (err) {
      this.fail('write', err);
      return 0;
    }
  }

  size(): number {
    const db = this.db;
    if (!db) return 0;
    try {
      return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM commit_analyses').get()?.n ?? 0;
    } catch (err) {
      this.fail('read', err);
      return 0;
    }
  }

  close(): void {
    closeQuietly(this.db, this.logger);
    this.db = undefined;
  }

  private checkVersion(fingerprint: string | undefined): void {
    const db = this.db;
    if (!db) return;

    const getMeta = db.prepare<[string], { value: string }>('SELECT value FROM metadata WHERE key = ?');
    const setMeta = db.prepare<[string, string]>('INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)');
    const expected = `${SCHEMA_VERSION}:${fingerprint ?? ''}`;
    const stored = getMeta.get('version')?.value;

    if (stored === expected) return;

    db.transaction(() => {
      const dropped = db.prepare('DELETE FROM commit_analyses').run().changes;
      setMeta.run('version', expected);
      if (stored !== undefined && dropped > 0) {
        this.logger.info(`analysis settings changed; dropped ${dropped} cached entries`);
      }
    })();
  }

  private fail(operation: string, err: unknown): void {
    this.logger.warn(`${new CacheIOError(operation, this.path, err).message}; cache disabled`);
    this.close();
  }
}

function closeQuietly(db: Database.Database | undefined, logger: Logger): void {
  if (!db || !db.open) return;
  try {
    db.close();
  } catch (err) {
    logger.debug(`closing cache failed: ${errorMessage(err)}`);
  }
}
