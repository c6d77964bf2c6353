import { z } from 'zod';

const id = z.coerce.number().int().positive();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const dateTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2})?$/, 'expected YYYY-MM-DD HH:MM[:SS]')
  .transform(v => v.replace('T', ' '));

export const FlightIdParamsSchema = z.object({ id });

export const FlightSearchQuerySchema = z
  .object({
    airlineId: id,
    from: isoDate,
    to: isoDate,
  })
  .refine(q => q.from <= q.to, { message: 'from must not be after to', path: ['from'] });

export const NewFlightSchema = z
  .object({
    flightNumber: z.string().trim().min(1).max(20),
    date: isoDate,
    scheduledDeparture: dateTime,
    scheduledArrival: dateTime,
    aircraftId: id,
    airlineId: id,
    originId: id,
    destinationId: id,
  })
  .strict();

export const BoardingRequestSchema = z
  .object({
    ticketId: id,
    flightId: id,
    gateId: id,
    processed: z.number().int().min(0).default(0),
  })
  .strict();

export const FrequentFlyersQuerySchema = z.object({
  minFlights: z.coerce.number().int().min(0).default(1),
});

export const RouteProfitabilityQuerySchema = z.object({
  originId: id,
  destinationId: id,
  days: z.coerce.number().int().min(0).default(30),
});

export const AirlineSummaryQuerySchema = z.object({
  since: isoDate.optional(),
});

export const BusiestAirportsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const MonthlyFlightsQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(9999).optional(),
});

export const FlightOccupancyQuerySchema = z.object({
  days: z.coerce.number().int().min(0).default(30),
});

export const BaggageQuerySchema = z.object({
  flightId: id.optional(),
});

export const OriginAirportsQuerySchema = z.object({
  days: z.coerce.number().int().min(0).default(30),
  minDepartures: z.coerce.number().int().min(0).default(10),
});
