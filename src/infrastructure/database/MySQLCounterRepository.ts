import { ICounterRepository } from '../../core/repositories/ICounterRepository.js';
import { SqlClient } from './DatabaseConnectionManager.js';

export const COUNTER_TABLE = 'ticket_counters';

/**
 * One statement creates the row on first use and increments it afterwards.
 * LAST_INSERT_ID(expr) makes the new value the statement's insert id, so the
 * number comes back from the same round trip without a second read.
 */
export const INCREMENT_SQL =
  `INSERT INTO ${COUNTER_TABLE} (name, seq) VALUES (?, LAST_INSERT_ID(1)) ` +
  'ON DUPLICATE KEY UPDATE seq = LAST_INSERT_ID(seq + 1)';

export const CREATE_TABLE_SQL =
  `CREATE TABLE IF NOT EXISTS ${COUNTER_TABLE} (` +
  'name VARCHAR(100) NOT NULL PRIMARY KEY, ' +
  'seq BIGINT UNSIGNED NOT NULL DEFAULT 0' +
  ') ENGINE=InnoDB DEFAULT CHARSET=utf8mb4';

/**
 * MySQL Counter Repository
 * Per-category ticket counters in the `ticket_counters` table
 */
export class MySQLCounterRepository implements ICounterRepository {
  constructor(private readonly db: SqlClient) {}

  /**
   * Create the counter table if it does not exist yet
   */
  async ensureSchema(): Promise<void> {
    await this.db.mutate(CREATE_TABLE_SQL);
  }

  async increment(name: string): Promise<number> {
    const result = await this.db.mutate(INCREMENT_SQL, [name]);
    return result.insertId;
  }

  async healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }
}
