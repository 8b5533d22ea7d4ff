import { Pool } from 'pg';
import { sql } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { env } from '../config';
import * as schema from '../db/schema';
import logger from './logger';

export type Database = NodePgDatabase<typeof schema>;

// The pool connects lazily, so importing this module opens nothing
export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  max: env.DATABASE_POOL_MAX,
});

pool.on('error', (error: Error) => {
  logger.error(`Idle Postgres client error: ${error.message}`);
});

export const db: Database = drizzle(pool, {
  schema,
  logger: env.NODE_ENV === 'development',
});

/**
 * Connect to database
 */
export const connectDatabase = async (): Promise<void> => {
  try {
    const client = await pool.connect();
    client.release();
    logger.info('✅ Database connected successfully');
  } catch (error) {
    logger.error('❌ Database connection failed:', error);
    throw error;
  }
};

/**
 * Disconnect from database
 */
export const disconnectDatabase = async (): Promise<void> => {
  await pool.end();
  logger.info('Database disconnected');
};

/**
 * Check database health
 */
export const checkDatabaseHealth = async (): Promise<boolean> => {
  try {
    await db.execute(sql`SELECT 1`);
    return true;
  } catch (error) {
    logger.warn(
      `Database health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return false;
  }
};
