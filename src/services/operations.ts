import pool from '../db';
import {
  AirlinePassengerStats,
  AirlinePassengerStatsRow,
  AirlineSummary,
  AirlineSummaryRow,
  AirportOperations,
  AirportOperationsRow,
  BaggageStateCount,
  BaggageStateRow,
  FlightOccupancy,
  FlightOccupancyRow,
  FlightStatus,
  MonthlyFlights,
  MonthlyFlightsRow,
  OriginAirport,
  OriginAirportRow,
  StatusBreakdownItem,
  StatusCountRow,
} from '../types';
import { classifyOccupancy, flightStatus, occupancyPercent, round2 } from '../utils/occupancy';

/** Vuelos por aerolínea; las aerolíneas sin vuelos salen con 0. */
export async function airlineSummary(since?: string): Promise<AirlineSummary[]> {
  const dateFilter = since ? 'AND v.fecha >= ?' : '';
  const [rows] = await pool.query<AirlineSummaryRow[]>(`
    SELECT a.nombre AS aerolinea, a.codigo_iata,
           COUNT(v.id) AS total_vuelos,
           COUNT(CASE WHEN v.resultado = 'COMPLETADO' THEN 1 END) AS vuelos_completados
    FROM aerolinea a
    LEFT JOIN vuelo v ON a.id = v.aerolinea_id ${dateFilter}
    GROUP BY a.id, a.nombre, a.codigo_iata
    ORDER BY total_vuelos DESC, a.nombre ASC
  `, since ? [since] : []);

  return rows.map(r => ({
    airline: r.aerolinea,
    iataCode: r.codigo_iata,
    totalFlights: r.total_vuelos,
    completedFlights: r.vuelos_completados,
  }));
}

export async function flightStatusBreakdown(): Promise<StatusBreakdownItem[]> {
  const [rows] = await pool.query<StatusCountRow[]>(`
    SELECT resultado, COUNT(*) AS cantidad
    FROM vuelo
    GROUP BY resultado
  `);

  // varios valores desconocidos de `resultado` caen en 'other'
  const counts = new Map<FlightStatus, number>();
  let total = 0;
  for (const r of rows) {
    const status = flightStatus(r.resultado);
    counts.set(status, (counts.get(status) ?? 0) + r.cantidad);
    total += r.cantidad;
  }
  if (total === 0) return [];

  return [...counts.entries()]
    .map(([status, count]) => ({ status, count, percentage: round2((count * 100) / total) }))
    .sort((a, b) => b.count - a.count || a.status.localeCompare(b.status));
}

export async function busiestAirports(limit = 10): Promise<AirportOperations[]> {
  const [rows] = await pool.query<AirportOperationsRow[]>(`
    SELECT ap.codigo_iata, ap.nombre AS aeropuerto, ap.ciudad,
           COUNT(DISTINCT vo.id) AS vuelos_salida,
           COUNT(DISTINCT vd.id) AS vuelos_llegada,
           COUNT(DISTINCT vo.id) + COUNT(DISTINCT vd.id) AS total_operaciones
    FROM aeropuerto ap
    LEFT JOIN vuelo vo ON ap.id = vo.aeropuerto_origen_id
    LEFT JOIN vuelo vd ON ap.id = vd.aeropuerto_destino_id
    GROUP BY ap.id, ap.codigo_iata, ap.nombre, ap.ciudad
    HAVING total_operaciones > 0
    ORDER BY total_operaciones DESC
    LIMIT ?
  `, [limit]);

  return rows.map(r => ({
    iataCode: r.codigo_iata,
    airport: r.aeropuerto,
    city: r.ciudad,
    departures: r.vuelos_salida,
    arrivals: r.vuelos_llegada,
    totalOperations: r.total_operaciones,
  }));
}

export async function monthlyFlights(year: number): Promise<MonthlyFlights[]> {
  const [rows] = await pool.query<MonthlyFlightsRow[]>(`
    SELECT MONTH(v.fecha) AS mes, MONTHNAME(v.fecha) AS nombre_mes,
           COUNT(*) AS total_vuelos,
           COUNT(DISTINCT v.aerolinea_id) AS aerolineas_operando,
           SUM(v.capacidad_pasajeros) AS capacidad_total
    FROM vuelo v
    WHERE YEAR(v.fecha) = ?
    GROUP BY MONTH(v.fecha), MONTHNAME(v.fecha)
    ORDER BY mes
  `, [year]);

  return rows.map(r => ({
    month: r.mes,
    monthName: r.nombre_mes,
    totalFlights: r.total_vuelos,
    airlinesOperating: r.aerolineas_operando,
    totalCapacity: r.capacidad_total ?? 0,
  }));
}

/**
 * Ocupación de los vuelos con al menos un ticket en los últimos `days` días,
 * de mayor a menor ocupación.
 */
export async function flightOccupancy(days = 30): Promise<FlightOccupancy[]> {
  const [rows] = await pool.query<FlightOccupancyRow[]>(`
    SELECT v.id, v.numero_vuelo, v.fecha, v.capacidad_pasajeros,
           COUNT(t.id) AS pasajeros_registrados
    FROM vuelo v
    LEFT JOIN ticket_aereo t ON v.id = t.vuelo_id
    WHERE v.fecha >= CURDATE() - INTERVAL ? DAY
    GROUP BY v.id, v.numero_vuelo, v.fecha, v.capacidad_pasajeros
    HAVING COUNT(t.id) > 0
  `, [days]);

  return rows
    .map(r => {
      const occupancy = occupancyPercent(r.pasajeros_registrados, r.capacidad_pasajeros);
      return {
        flightId: r.id,
        flightNumber: r.numero_vuelo,
        date: r.fecha,
        capacity: r.capacidad_pasajeros,
        passengers: r.pasajeros_registrados,
        occupancy,
        classification: classifyOccupancy(occupancy),
      };
    })
    .sort((a, b) => b.occupancy - a.occupancy || a.flightId - b.flightId);
}

/** Equipaje por vuelo y estado; un vuelo sin equipaje sale con estado null y 0. */
export async function baggageByState(flightId?: number): Promise<BaggageStateCount[]> {
  const flightFilter = flightId !== undefined ? 'WHERE v.id = ?' : '';
  const [rows] = await pool.query<BaggageStateRow[]>(`
    SELECT v.numero_vuelo, v.fecha, e.estado, COUNT(e.id) AS cantidad_equipaje
    FROM vuelo v
    LEFT JOIN equipaje e ON v.id = e.vuelo_id
    ${flightFilter}
    GROUP BY v.id, v.numero_vuelo, v.fecha, e.estado
    ORDER BY v.fecha DESC, cantidad_equipaje DESC
  `, flightId !== undefined ? [flightId] : []);

  return rows.map(r => ({
    flightNumber: r.numero_vuelo,
    date: r.fecha,
    state: r.estado,
    count: r.cantidad_equipaje,
  }));
}

/** Tickets, pasajeros únicos y equipaje por aerolínea. */
export async function airlinePassengerStats(since?: string): Promise<AirlinePassengerStats[]> {
  const dateFilter = since ? 'WHERE v.fecha >= ?' : '';
  const [rows] = await pool.query<AirlinePassengerStatsRow[]>(`
    SELECT al.nombre AS aerolinea,
           COUNT(DISTINCT v.id) AS total_vuelos,
           COUNT(t.id) AS total_tickets,
           COUNT(DISTINCT p.id) AS pasajeros_unicos,
           COUNT(e.id) AS total_equipajes
    FROM aerolinea al
    JOIN vuelo v ON al.id = v.aerolinea_id
    LEFT JOIN ticket_aereo t ON v.id = t.vuelo_id
    LEFT JOIN pasajero p ON t.pasajero_id = p.id
    LEFT JOIN equipaje e ON t.id = e.ticket_aereo_id
    ${dateFilter}
    GROUP BY al.id, al.nombre
    ORDER BY total_tickets DESC
  `, since ? [since] : []);

  return rows.map(r => ({
    airline: r.aerolinea,
    totalFlights: r.total_vuelos,
    totalTickets: r.total_tickets,
    uniquePassengers: r.pasajeros_unicos,
    totalBaggage: r.total_equipajes,
  }));
}

/** Aeropuertos con más de `minDepartures` salidas en los últimos `days` días. */
export async function busyOriginAirports(days = 30, minDepartures = 10): Promise<OriginAirport[]> {
  const [rows] = await pool.query<OriginAirportRow[]>(`
    SELECT ap.codigo_iata, ap.nombre, ap.ciudad, ap.pais,
           COUNT(v.id) AS total_vuelos_origen
    FROM aeropuerto ap
    JOIN vuelo v ON ap.id = v.aeropuerto_origen_id
    WHERE v.fecha >= CURDATE() - INTERVAL ? DAY
    GROUP BY ap.id, ap.codigo_iata, ap.nombre, ap.ciudad, ap.pais
    HAVING COUNT(v.id) > ?
    ORDER BY total_vuelos_origen DESC
  `, [days, minDepartures]);

  return rows.map(r => ({
    iataCode: r.codigo_iata,
    name: r.nombre,
    city: r.ciudad,
    country: r.pais,
    departures: r.total_vuelos_origen,
  }));
}
