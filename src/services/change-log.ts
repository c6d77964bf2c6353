import type { PoolConnection, ResultSetHeader } from 'mysql2/promise';
import { config } from '../config';
import { ChangeLogEntry } from '../types';

/**
 * Agrega una entrada a `log_cambios`. Quien muta datos la llama con la
 * conexión de su transacción.
 */
export async function appendChangeLog(conn: PoolConnection, entry: ChangeLogEntry) {
  const [result] = await conn.query<ResultSetHeader>(
    `INSERT INTO log_cambios (quien, que, entidad_id, accion, detalles)
     VALUES (?, ?, ?, ?, ?)`,
    [entry.actor ?? config.CHANGE_LOG_ACTOR, entry.entity, entry.entityId, entry.action, entry.detail]
  );
  return result.insertId;
}
