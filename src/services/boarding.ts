import { BoardingInput, BoardingOutcome, BoardingTally, CountRow } from '../types';
import { logger } from '../utils/logger';
import { withTransaction } from '../utils/transaction';
import { appendChangeLog } from './change-log';

/**
 * Registra el embarque de un ticket en su vuelo y suma uno al contador
 * que trae quien llama. Si el ticket no pertenece al vuelo no se escribe
 * nada y el contador vuelve igual.
 *
 * El INSERT en `embarque` y su entrada en `log_cambios` van en la misma
 * transacción.
 */
export async function registerBoarding(
  input: BoardingInput,
  tally: BoardingTally
): Promise<BoardingOutcome> {
  const outcome = await withTransaction(async conn => {
    const [rows] = await conn.query<CountRow[]>(
      `SELECT COUNT(*) AS total FROM ticket_aereo WHERE id = ? AND vuelo_id = ?`,
      [input.ticketId, input.flightId]
    );
    if ((rows[0]?.total ?? 0) === 0) {
      return { registered: false, tally: { ...tally } };
    }

    await conn.query(`
      INSERT INTO embarque (vuelo_id, ticket_aereo_id, puerta_id, hora_embarque, estado)
      VALUES (?, ?, ?, NOW(), 'OK')
    `, [input.flightId, input.ticketId, input.gateId]);

    const processed = tally.processed + 1;

    await appendChangeLog(conn, {
      entity: 'embarque',
      entityId: input.ticketId,
      action: 'INSERT',
      detail: `Boarding processed. Total: ${processed}`,
    });

    return { registered: true, tally: { processed } };
  });

  if (outcome.registered) {
    logger.info({ ...input, processed: outcome.tally.processed }, 'boarding registered');
  } else {
    logger.debug(input, 'ticket not on flight, boarding skipped');
  }
  return outcome;
}
