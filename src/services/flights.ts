import type { ResultSetHeader } from 'mysql2/promise';
import pool from '../db';
import {
  CapacityRow,
  CountRow,
  FlightClassification,
  FlightCountsRow,
  FlightRegistrationResult,
  FlightSearchResult,
  FlightSearchRow,
  FlightStatistics,
  NewFlightInput,
} from '../types';
import { AppError, ErrorCodes } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  classifyOccupancy,
  flightStatus,
  occupancyMessage,
  occupancyPercent,
} from '../utils/occupancy';
import { withTransaction } from '../utils/transaction';
import { appendChangeLog } from './change-log';

export const REGISTRATION_MESSAGES = {
  created: 'OK: flight registered successfully',
  duplicate: 'ERROR: a flight with that number already exists on that date',
  failed: 'ERROR: the flight could not be registered',
} as const;

export async function searchFlights(
  airlineId: number,
  from: string,
  to: string
): Promise<FlightSearchResult[]> {
  const [rows] = await pool.query<FlightSearchRow[]>(`
    SELECT v.id, v.numero_vuelo, v.fecha, v.hora_salida_programada,
           ao.ciudad AS origen, ad.ciudad AS destino,
           v.resultado, v.capacidad_pasajeros
    FROM vuelo v
    JOIN aeropuerto ao ON v.aeropuerto_origen_id = ao.id
    JOIN aeropuerto ad ON v.aeropuerto_destino_id = ad.id
    WHERE v.aerolinea_id = ?
      AND v.fecha BETWEEN ? AND ?
    ORDER BY v.fecha ASC, v.hora_salida_programada ASC
  `, [airlineId, from, to]);

  logger.debug({ airlineId, from, to, count: rows.length }, 'flight search');

  return rows.map(r => ({
    id: r.id,
    flightNumber: r.numero_vuelo,
    date: r.fecha,
    scheduledDeparture: r.hora_salida_programada,
    originCity: r.origen,
    destinationCity: r.destino,
    outcome: r.resultado,
    status: flightStatus(r.resultado),
    capacity: r.capacidad_pasajeros,
  }));
}

/** Capacidad del vuelo, o null si no existe. */
async function getFlightCapacity(flightId: number) {
  const [rows] = await pool.query<CapacityRow[]>(
    `SELECT capacidad_pasajeros FROM vuelo WHERE id = ?`,
    [flightId]
  );
  return rows[0]?.capacidad_pasajeros ?? null;
}

/**
 * Pasajeros, equipaje y check-ins de un vuelo. Un vuelo inexistente da
 * ceros en lugar de error.
 */
export async function getFlightStatistics(flightId: number): Promise<FlightStatistics> {
  const capacity = await getFlightCapacity(flightId);

  const [rows] = await pool.query<FlightCountsRow[]>(`
    SELECT
      (SELECT COUNT(*) FROM ticket_aereo WHERE vuelo_id = ?) AS total_pasajeros,
      (SELECT COUNT(*) FROM equipaje WHERE vuelo_id = ?) AS total_equipaje,
      (SELECT COUNT(*)
         FROM ticket_aereo t
         JOIN pasajero p ON t.pasajero_id = p.id
        WHERE t.vuelo_id = ? AND p.check_in = 1) AS check_in_completados
  `, [flightId, flightId, flightId]);

  const counts = rows[0];
  const totalPassengers = counts?.total_pasajeros ?? 0;

  return {
    totalPassengers,
    totalBaggage: counts?.total_equipaje ?? 0,
    checkedIn: counts?.check_in_completados ?? 0,
    occupancy: occupancyPercent(totalPassengers, capacity),
  };
}

export async function classifyFlight(flightId: number): Promise<FlightClassification> {
  const capacity = await getFlightCapacity(flightId);
  const [rows] = await pool.query<CountRow[]>(
    `SELECT COUNT(*) AS total FROM ticket_aereo WHERE vuelo_id = ?`,
    [flightId]
  );

  const occupancy = occupancyPercent(rows[0]?.total ?? 0, capacity);
  const classification = classifyOccupancy(occupancy);

  return {
    classification,
    occupancy,
    message: occupancyMessage(classification, occupancy),
  };
}

/**
 * Alta de vuelo en una sola transacción:
 * - numero_vuelo + fecha duplicado => ROLLBACK y `duplicate`.
 * - la capacidad se copia de la aeronave.
 * - vuelo y log_cambios se confirman juntos o ninguno.
 * Cualquier error del motor termina en `failed`; nunca lanza.
 */
export async function registerFlight(input: NewFlightInput): Promise<FlightRegistrationResult> {
  try {
    const flightId = await withTransaction(async conn => {
      const [existing] = await conn.query<CountRow[]>(
        // FOR UPDATE: un alta concurrente del mismo número y fecha espera aquí
        `SELECT COUNT(*) AS total FROM vuelo WHERE numero_vuelo = ? AND fecha = ? FOR UPDATE`,
        [input.flightNumber, input.date]
      );
      if ((existing[0]?.total ?? 0) > 0) {
        throw new AppError(REGISTRATION_MESSAGES.duplicate, 409, true, ErrorCodes.DUPLICATE_FLIGHT, {
          flightNumber: input.flightNumber,
          date: input.date,
        });
      }

      const [aircraft] = await conn.query<CapacityRow[]>(
        `SELECT capacidad_pasajeros FROM aeronave WHERE id = ?`,
        [input.aircraftId]
      );

      const [inserted] = await conn.query<ResultSetHeader>(`
        INSERT INTO vuelo (
          numero_vuelo, fecha, hora_salida_programada, llegada_programada,
          aeronave_id, aerolinea_id, aeropuerto_origen_id, aeropuerto_destino_id,
          capacidad_pasajeros
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `, [
        input.flightNumber,
        input.date,
        input.scheduledDeparture,
        input.scheduledArrival,
        input.aircraftId,
        input.airlineId,
        input.originId,
        input.destinationId,
        aircraft[0]?.capacidad_pasajeros ?? null,
      ]);

      await appendChangeLog(conn, {
        entity: 'vuelo',
        entityId: inserted.insertId,
        action: 'INSERT',
        detail: `Flight created: ${input.flightNumber}`,
      });

      return inserted.insertId;
    });

    logger.info({ flightId, flightNumber: input.flightNumber }, 'flight registered');
    return { status: 'created', flightId, message: REGISTRATION_MESSAGES.created };
  } catch (err) {
    if (err instanceof AppError && err.code === ErrorCodes.DUPLICATE_FLIGHT) {
      logger.warn({ flightNumber: input.flightNumber, date: input.date }, 'duplicate flight');
      return { status: 'duplicate', flightId: null, message: REGISTRATION_MESSAGES.duplicate };
    }
    logger.error({ err, flightNumber: input.flightNumber }, 'flight registration failed');
    return { status: 'failed', flightId: null, message: REGISTRATION_MESSAGES.failed };
  }
}
