import { FlightStatus, LoyaltyTier, OccupancyTier, ProfitabilityTier } from '../types';

export const round2 = (value: number) => Math.round((value + Number.EPSILON) * 100) / 100;

/** pasajeros / capacidad * 100; capacidad 0 o desconocida => 0 */
export const occupancyPercent = (passengers: number, capacity: number | null | undefined) =>
  capacity != null && capacity > 0 ? round2((passengers / capacity) * 100) : 0;

// Umbrales inclusivos en el borde inferior de cada nivel
export const classifyOccupancy = (occupancy: number): OccupancyTier => {
  if (occupancy >= 95) return 'COMPLETE';
  if (occupancy >= 80) return 'HIGH_DEMAND';
  if (occupancy >= 50) return 'MEDIUM_DEMAND';
  if (occupancy > 0) return 'LOW_DEMAND';
  return 'NO_RESERVATIONS';
};

const TIER_MESSAGES: Record<OccupancyTier, string> = {
  COMPLETE: 'Full flight',
  HIGH_DEMAND: 'High demand',
  MEDIUM_DEMAND: 'Medium demand',
  LOW_DEMAND: 'Low demand',
  NO_RESERVATIONS: 'No reservations for this flight',
};

export const occupancyMessage = (tier: OccupancyTier, occupancy: number) =>
  `${TIER_MESSAGES[tier]}. Occupancy: ${occupancy.toFixed(2)}%`;

export const profitabilityTier = (averageOccupancy: number): ProfitabilityTier => {
  if (averageOccupancy >= 80) return 'HIGH';
  if (averageOccupancy >= 60) return 'MEDIUM';
  if (averageOccupancy >= 40) return 'LOW';
  return 'NOT_PROFITABLE';
};

export const frequentFlyerTier = (totalFlights: number): LoyaltyTier => {
  if (totalFlights >= 20) return 'PLATINUM';
  if (totalFlights >= 10) return 'GOLD';
  if (totalFlights >= 5) return 'SILVER';
  return 'BRONZE';
};

export const flightStatus = (outcome: string | null): FlightStatus => {
  switch (outcome) {
    case null:
      return 'scheduled';
    case 'COMPLETADO':
      return 'completed';
    case 'CANCELADO':
      return 'cancelled';
    case 'EN_VUELO':
      return 'in_flight';
    default:
      return 'other';
  }
};
