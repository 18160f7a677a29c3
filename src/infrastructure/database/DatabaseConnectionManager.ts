import mysql from 'mysql2/promise';
import { CircuitBreaker } from './CircuitBreaker.js';
import { ILogger } from '../../core/repositories/ILogger.js';

export type SqlParam = string | number | null;

/**
 * Outcome of an INSERT/UPDATE statement
 */
export interface MutationResult {
  readonly insertId: number;
  readonly affectedRows: number;
}

/**
 * What repositories need from the database layer
 */
export interface SqlClient {
  query<T extends mysql.RowDataPacket>(sql: string, params?: SqlParam[]): Promise<T[]>;
  mutate(sql: string, params?: SqlParam[]): Promise<MutationResult>;
  healthCheck(): Promise<boolean>;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectionLimit?: number;
  queueLimit?: number;
}

/**
 * Database Connection Manager
 * Manages the MySQL connection pool behind a circuit breaker
 */
export class DatabaseConnectionManager implements SqlClient {
  private pool: mysql.Pool | null = null;
  private metrics = {
    totalQueries: 0,
    slowQueries: 0,
    errors: 0,
    activeConnections: 0
  };

  constructor(
    private readonly config: DatabaseConfig,
    private readonly logger: ILogger,
    private readonly circuitBreaker: CircuitBreaker = new CircuitBreaker()
  ) {}

  /**
   * Initialize connection pool
   */
  async connect(): Promise<void> {
    this.pool = mysql.createPool({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      connectionLimit: this.config.connectionLimit || 10,
      queueLimit: this.config.queueLimit || 50,
      waitForConnections: true,
      enableKeepAlive: true,
      keepAliveInitialDelay: 0,
      connectTimeout: 10000,
      namedPlaceholders: false
    });

    this.logger.info(`MySQL connection pool created for ${this.config.host}:${this.config.port}/${this.config.database}`);

    if (!(await this.healthCheck())) {
      throw new Error(`Cannot reach MySQL at ${this.config.host}:${this.config.port}`);
    }
  }

  /**
   * Run a SELECT with circuit breaker protection
   */
  async query<T extends mysql.RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return this.run(sql, connection => connection.execute<T[]>(sql, params));
  }

  /**
   * Run an INSERT/UPDATE with circuit breaker protection
   */
  async mutate(sql: string, params: SqlParam[] = []): Promise<MutationResult> {
    const header = await this.run(sql, connection => connection.execute<mysql.ResultSetHeader>(sql, params));
    return { insertId: header.insertId, affectedRows: header.affectedRows };
  }

  /**
   * Health check - verify database is accessible
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.query('SELECT 1 as health');
      return true;
    } catch (error) {
      this.logger.error('Health check failed', error);
      return false;
    }
  }

  getStats(): DatabaseStats {
    return {
      ...this.metrics,
      circuitState: this.circuitBreaker.getState()
    };
  }

  /**
   * Disconnect and cleanup
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.info('MySQL connection pool closed');
    }
  }

  private async run<T>(sql: string, statement: (connection: mysql.PoolConnection) => Promise<[T, mysql.FieldPacket[]]>): Promise<T> {
    const pool = this.pool;
    if (!pool) {
      throw new Error('Database not connected. Call connect() first.');
    }

    return this.circuitBreaker.execute(async () => {
      const startTime = Date.now();
      let connection: mysql.PoolConnection | null = null;

      try {
        connection = await pool.getConnection();
        this.metrics.activeConnections++;

        const [result] = await statement(connection);

        this.trackQueryPerformance(sql, Date.now() - startTime);
        return result;
      } catch (error) {
        this.metrics.errors++;
        this.handleQueryError(error, sql);
        throw error;
      } finally {
        if (connection) {
          connection.release();
          this.metrics.activeConnections--;
        }
      }
    });
  }

  private trackQueryPerformance(sql: string, duration: number): void {
    this.metrics.totalQueries++;

    if (duration > 1000) {
      this.metrics.slowQueries++;
      this.logger.warn(`Slow query detected (${duration}ms): ${sql.substring(0, 100)}`);
    }
  }

  private handleQueryError(error: unknown, sql: string): void {
    this.logger.error('Query error', {
      error: error instanceof Error ? error.message : String(error),
      code: error instanceof Error && 'code' in error ? String(error.code) : undefined,
      sql: sql.substring(0, 100)
    });
  }
}

export interface DatabaseStats {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  activeConnections: number;
  circuitState: string;
}
