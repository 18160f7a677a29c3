import {
  CREATE_TABLE_SQL,
  INCREMENT_SQL,
  MySQLCounterRepository
} from '../../../src/infrastructure/database/MySQLCounterRepository.js';
import { SqlClient } from '../../../src/infrastructure/database/DatabaseConnectionManager.js';

function createClient() {
  const client = {
    query: jest.fn(),
    mutate: jest.fn(),
    healthCheck: jest.fn()
  };
  const sql: SqlClient = client;
  return { client, sql };
}

describe('MySQLCounterRepository', () => {
  it('should increment with a single upsert and return the insert id', async () => {
    const { client, sql } = createClient();
    client.mutate.mockResolvedValue({ insertId: 7, affectedRows: 2 });

    const value = await new MySQLCounterRepository(sql).increment('General');

    expect(value).toBe(7);
    expect(client.mutate).toHaveBeenCalledTimes(1);
    expect(client.mutate).toHaveBeenCalledWith(INCREMENT_SQL, ['General']);
  });

  it('should use LAST_INSERT_ID for both the first and later increments', () => {
    expect(INCREMENT_SQL).toBe(
      'INSERT INTO ticket_counters (name, seq) VALUES (?, LAST_INSERT_ID(1)) ' +
      'ON DUPLICATE KEY UPDATE seq = LAST_INSERT_ID(seq + 1)'
    );
  });

  it('should propagate store errors', async () => {
    const { client, sql } = createClient();
    client.mutate.mockRejectedValue(new Error('ER_LOCK_DEADLOCK'));

    await expect(new MySQLCounterRepository(sql).increment('General')).rejects.toThrow('ER_LOCK_DEADLOCK');
  });

  it('should create the counter table', async () => {
    const { client, sql } = createClient();
    client.mutate.mockResolvedValue({ insertId: 0, affectedRows: 0 });

    await new MySQLCounterRepository(sql).ensureSchema();

    expect(client.mutate).toHaveBeenCalledWith(CREATE_TABLE_SQL);
  });

  it('should delegate health checks', async () => {
    const { client, sql } = createClient();
    client.healthCheck.mockResolvedValue(true);

    expect(await new MySQLCounterRepository(sql).healthCheck()).toBe(true);
  });
});
