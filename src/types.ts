import type { RowDataPacket } from 'mysql2/promise';

export type FlightStatus = 'completed' | 'cancelled' | 'in_flight' | 'scheduled' | 'other';

export interface FlightSearchRow extends RowDataPacket {
  id: number;
  numero_vuelo: string;
  fecha: string;
  hora_salida_programada: string;
  origen: string;
  destino: string;
  resultado: string | null;
  capacidad_pasajeros: number | null;
}

export interface CapacityRow extends RowDataPacket {
  capacidad_pasajeros: number | null;
}

export interface CountRow extends RowDataPacket {
  total: number;
}

export interface FlightCountsRow extends RowDataPacket {
  total_pasajeros: number;
  total_equipaje: number;
  check_in_completados: number;
}

export interface FrequentFlyerRow extends RowDataPacket {
  id: number;
  nombre: string;
  apellido: string;
  total_vuelos: number;
}

export interface RouteTotalsRow extends RowDataPacket {
  total_vuelos: number;
  capacidad_total: number | null;
  pasajeros_total: number | null;
}

export interface AirlineSummaryRow extends RowDataPacket {
  aerolinea: string;
  codigo_iata: string;
  total_vuelos: number;
  vuelos_completados: number;
}

export interface StatusCountRow extends RowDataPacket {
  resultado: string | null;
  cantidad: number;
}

export interface AirportOperationsRow extends RowDataPacket {
  codigo_iata: string;
  aeropuerto: string;
  ciudad: string;
  vuelos_salida: number;
  vuelos_llegada: number;
  total_operaciones: number;
}

export interface MonthlyFlightsRow extends RowDataPacket {
  mes: number;
  nombre_mes: string;
  total_vuelos: number;
  aerolineas_operando: number;
  capacidad_total: number | null;
}

export interface FlightOccupancyRow extends RowDataPacket {
  id: number;
  numero_vuelo: string;
  fecha: string;
  capacidad_pasajeros: number | null;
  pasajeros_registrados: number;
}

export interface BaggageStateRow extends RowDataPacket {
  numero_vuelo: string;
  fecha: string;
  estado: string | null;
  cantidad_equipaje: number;
}

export interface AirlinePassengerStatsRow extends RowDataPacket {
  aerolinea: string;
  total_vuelos: number;
  total_tickets: number;
  pasajeros_unicos: number;
  total_equipajes: number;
}

export interface OriginAirportRow extends RowDataPacket {
  codigo_iata: string;
  nombre: string;
  ciudad: string;
  pais: string;
  total_vuelos_origen: number;
}

export type FlightSearchResult = {
  id: number;
  flightNumber: string;
  date: string;
  scheduledDeparture: string;
  originCity: string;
  destinationCity: string;
  outcome: string | null;
  status: FlightStatus;
  capacity: number | null;
};

export type FlightStatistics = {
  totalPassengers: number;
  totalBaggage: number;
  checkedIn: number;
  occupancy: number;
};

export type OccupancyTier =
  | 'COMPLETE'
  | 'HIGH_DEMAND'
  | 'MEDIUM_DEMAND'
  | 'LOW_DEMAND'
  | 'NO_RESERVATIONS';

export type FlightClassification = {
  classification: OccupancyTier;
  occupancy: number;
  message: string;
};

export type NewFlightInput = {
  flightNumber: string;
  date: string;
  scheduledDeparture: string;
  scheduledArrival: string;
  aircraftId: number;
  airlineId: number;
  originId: number;
  destinationId: number;
};

export type FlightRegistrationResult =
  | { status: 'created'; flightId: number; message: string }
  | { status: 'duplicate'; flightId: null; message: string }
  | { status: 'failed'; flightId: null; message: string };

/** Contador de embarques que mantiene quien llama. */
export type BoardingTally = {
  processed: number;
};

export type BoardingInput = {
  ticketId: number;
  flightId: number;
  gateId: number;
};

export type BoardingOutcome = {
  registered: boolean;
  tally: BoardingTally;
};

export type LoyaltyTier = 'PLATINUM' | 'GOLD' | 'SILVER' | 'BRONZE';

export type FrequentFlyer = {
  passengerId: number;
  fullName: string;
  totalFlights: number;
  tier: LoyaltyTier;
};

export type ProfitabilityTier = 'HIGH' | 'MEDIUM' | 'LOW' | 'NOT_PROFITABLE';

export type RouteProfitability = {
  totalFlights: number;
  totalPassengers: number;
  averageOccupancy: number;
  profitability: ProfitabilityTier;
};

export type AirlineSummary = {
  airline: string;
  iataCode: string;
  totalFlights: number;
  completedFlights: number;
};

export type StatusBreakdownItem = {
  status: FlightStatus;
  count: number;
  percentage: number;
};

export type AirportOperations = {
  iataCode: string;
  airport: string;
  city: string;
  departures: number;
  arrivals: number;
  totalOperations: number;
};

export type MonthlyFlights = {
  month: number;
  monthName: string;
  totalFlights: number;
  airlinesOperating: number;
  totalCapacity: number;
};

export type FlightOccupancy = {
  flightId: number;
  flightNumber: string;
  date: string;
  capacity: number | null;
  passengers: number;
  occupancy: number;
  classification: OccupancyTier;
};

export type BaggageStateCount = {
  flightNumber: string;
  date: string;
  state: string | null;
  count: number;
};

export type AirlinePassengerStats = {
  airline: string;
  totalFlights: number;
  totalTickets: number;
  uniquePassengers: number;
  totalBaggage: number;
};

export type OriginAirport = {
  iataCode: string;
  name: string;
  city: string;
  country: string;
  departures: number;
};

export type ChangeLogEntry = {
  actor?: string;
  entity: string;
  entityId: number;
  action: 'INSERT' | 'UPDATE' | 'DELETE';
  detail: string;
};
