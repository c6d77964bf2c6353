import type { PoolConnection } from 'mysql2/promise';
import pool from '../db';
import { logger } from './logger';

/**
 * Ejecuta `work` dentro de una transacción sobre una conexión dedicada.
 * Si `work` lanza, se hace ROLLBACK y se propaga el error original, aunque
 * el ROLLBACK también falle.
 */
export async function withTransaction<T>(work: (conn: PoolConnection) => Promise<T>): Promise<T> {
  const conn = await pool.getConnection();
  try {
    await conn.beginTransaction();
    const result = await work(conn);
    await conn.commit();
    return result;
  } catch (err) {
    try {
      await conn.rollback();
    } catch (rollbackErr) {
      logger.error({ err: rollbackErr, cause: err }, 'rollback failed');
    }
    throw err;
  } finally {
    conn.release();
  }
}
