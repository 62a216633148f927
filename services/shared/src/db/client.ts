import { Pool, PoolClient, PoolConfig } from 'pg';
import type { DatabaseConfig } from '../config/config';
import { logger } from '../utils/logger';

export interface Database {
     readonly pool: Pool;
     withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
     withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
     checkConnection(): Promise<boolean>;
     close(): Promise<void>;
}

export function createDatabase(config: DatabaseConfig): Database {
     const poolConfig: PoolConfig = {
          connectionString: config.connectionString,
          min: config.poolMin,
          max: config.poolMax,
          idleTimeoutMillis: config.idleTimeoutMs,
          connectionTimeoutMillis: config.connectionTimeoutMs,
     };
     const pool = new Pool(poolConfig);

     // Log pool errors
     pool.on('error', (err) => {
          logger.error({ err }, 'Unexpected PostgreSQL pool error');
     });

     // Connection health check
     async function checkConnection(): Promise<boolean> {
          try {
               const client = await pool.connect();
               try {
                    await client.query('SELECT 1');
               } finally {
                    client.release();
               }
               return true;
          } catch (error) {
               logger.error({ error }, 'Database connection check failed');
               return false;
          }
     }

     // Transaction helper
     async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
          const client = await pool.connect();
          try {
               await client.query('BEGIN');
               const result = await fn(client);
               await client.query('COMMIT');
               return result;
          } catch (err) {
               await client.query('ROLLBACK');
               throw err;
          } finally {
               client.release();
          }
     }

     // Connection helper for non-transactional queries
     async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
          const client = await pool.connect();
          try {
               return await fn(client);
          } finally {
               client.release();
          }
     }

     async function close(): Promise<void> {
          await pool.end();
          logger.info('Database pool closed');
     }

     return { pool, withTransaction, withConnection, checkConnection, close };
}
