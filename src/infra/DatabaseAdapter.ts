import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { DatabaseError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const IN_MEMORY = ':memory:';

/**
 * SQLite database adapter
 * Domain layer never imports this - accessed through repositories
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    try {
      if (env.SQLITE_DB_PATH !== IN_MEMORY) {
        mkdirSync(dirname(env.SQLITE_DB_PATH), { recursive: true });
      }
      this.db = new Database(env.SQLITE_DB_PATH);
      if (env.SQLITE_DB_PATH !== IN_MEMORY) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('foreign_keys = ON');
      this.initializeSchema();
      logger.info('Database initialized', { path: env.SQLITE_DB_PATH });
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', { error });
    }
  }

  private initializeSchema(): void {
    try {
      const schemaPath = join(__dirname, 'db', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');
      this.db.exec(schema);
      logger.debug('Database schema initialized');
    } catch (error) {
      throw new DatabaseError('Failed to initialize database schema', { error });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params) as T[];
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new DatabaseError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare(sql);
      return (stmt.get(...params) as T | undefined) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new DatabaseError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE statement
   * Returns the number of affected rows and the last inserted row id
   */
  execute(sql: string, params: unknown[] = []): { changes: number; lastInsertRowid: number } {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return { changes: result.changes, lastInsertRowid: Number(result.lastInsertRowid) };
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new DatabaseError('Execute failed', { sql, error });
    }
  }

  /**
   * Execute multiple statements in a transaction. Nested calls run as savepoints.
   * Rolls back on any error; domain errors are rethrown as they are.
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      logger.error('Transaction failed, rolling back', { error });
      throw new DatabaseError('Transaction failed', { error });
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
