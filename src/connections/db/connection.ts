import { Pool } from 'pg';
import { AppConfig } from '../config/app.config';
import { logger, errorMeta } from '../../utils/logging';

export const createPool = (dbConfig: AppConfig['db']): Pool => {
  const pool = new Pool(dbConfig);

  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', errorMeta(err));
    process.exit(-1);
  });

  return pool;
};

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (
  pool: Pool,
  maxRetries: number = 10,
  retryDelay: number = 2000
): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts`, errorMeta(err));
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, errorMeta(err));
      await new Promise(resolve => setTimeout(resolve, retryDelay));
    }
  }
};
