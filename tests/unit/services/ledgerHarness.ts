import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { createLedger, type LedgerConfig } from '../../../src/app.js';
import type { ApiDependencies } from '../../../src/api/index.js';

export interface LedgerHarness extends ApiDependencies {
  db: DatabaseAdapter;
}

/**
 * A full ledger over a fresh in-memory database built from the real schema
 */
export function createLedgerHarness(config: Partial<LedgerConfig> = {}): LedgerHarness {
  const db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
  return {
    db,
    ...createLedger(db, {
      CLOSE_POLICY: config.CLOSE_POLICY ?? 'strict',
      RECURRENCE_AUTO_EXPAND: config.RECURRENCE_AUTO_EXPAND ?? false,
    }),
  };
}
