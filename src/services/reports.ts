import pool from '../db';
import { FrequentFlyer, FrequentFlyerRow, RouteProfitability, RouteTotalsRow } from '../types';
import { logger } from '../utils/logger';
import { frequentFlyerTier, occupancyPercent, profitabilityTier } from '../utils/occupancy';

/**
 * Pasajeros con al menos `minFlights` tickets, de más a menos vuelos,
 * con su categoría. El resultado intermedio vive solo en esta llamada.
 */
export async function frequentFlyers(minFlights: number): Promise<FrequentFlyer[]> {
  const [rows] = await pool.query<FrequentFlyerRow[]>(`
    SELECT p.id, p.nombre, p.apellido, COUNT(t.id) AS total_vuelos
    FROM pasajero p
    JOIN ticket_aereo t ON p.id = t.pasajero_id
    GROUP BY p.id, p.nombre, p.apellido
    HAVING COUNT(t.id) >= ?
    ORDER BY total_vuelos DESC, p.id ASC
  `, [minFlights]);

  logger.debug({ minFlights, count: rows.length }, 'frequent flyers report');

  return rows.map(r => ({
    passengerId: r.id,
    fullName: `${r.nombre} ${r.apellido}`,
    totalFlights: r.total_vuelos,
    tier: frequentFlyerTier(r.total_vuelos),
  }));
}

/**
 * Rentabilidad de una ruta en los últimos `days` días. La capacidad se suma
 * una vez por vuelo (los tickets se cuentan en la subconsulta), así los
 * vuelos sin tickets también aportan capacidad.
 */
export async function routeProfitability(
  originId: number,
  destinationId: number,
  days: number
): Promise<RouteProfitability> {
  const [rows] = await pool.query<RouteTotalsRow[]>(`
    SELECT COUNT(*) AS total_vuelos,
           SUM(x.capacidad_pasajeros) AS capacidad_total,
           SUM(x.tickets) AS pasajeros_total
    FROM (
      SELECT v.id, v.capacidad_pasajeros, COUNT(t.id) AS tickets
      FROM vuelo v
      LEFT JOIN ticket_aereo t ON v.id = t.vuelo_id
      WHERE v.aeropuerto_origen_id = ?
        AND v.aeropuerto_destino_id = ?
        AND v.fecha >= CURDATE() - INTERVAL ? DAY
      GROUP BY v.id, v.capacidad_pasajeros
    ) x
  `, [originId, destinationId, days]);

  const totals = rows[0];
  const totalPassengers = totals?.pasajeros_total ?? 0;
  const averageOccupancy = occupancyPercent(totalPassengers, totals?.capacidad_total);

  return {
    totalFlights: totals?.total_vuelos ?? 0,
    totalPassengers,
    averageOccupancy,
    profitability: profitabilityTier(averageOccupancy),
  };
}
