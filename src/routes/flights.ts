import { Router } from 'express';
import { FlightIdParamsSchema, FlightSearchQuerySchema, NewFlightSchema } from '../schemas';
import {
  classifyFlight,
  getFlightStatistics,
  registerFlight,
  searchFlights,
} from '../services/flights';

const router = Router();

const REGISTRATION_STATUS = { created: 201, duplicate: 409, failed: 500 } as const;

/**
 * GET /flights?airlineId=1&from=2024-01-01&to=2024-12-31
 *  200 -> { code: 200, data: [...] }
 *  400 -> { code: 400, errors: "..." }
 */
router.get('/', async (req, res, next) => {
  try {
    const { airlineId, from, to } = FlightSearchQuerySchema.parse(req.query);
    const flights = await searchFlights(airlineId, from, to);
    return res.json({ code: 200, data: flights });
  } catch (err) {
    next(err);
  }
});

router.get('/:id/stats', async (req, res, next) => {
  try {
    const { id } = FlightIdParamsSchema.parse(req.params);
    const stats = await getFlightStatistics(id);
    return res.json({ code: 200, data: { flightId: id, ...stats } });
  } catch (err) {
    next(err);
  }
});

router.get('/:id/classification', async (req, res, next) => {
  try {
    const { id } = FlightIdParamsSchema.parse(req.params);
    const classification = await classifyFlight(id);
    return res.json({ code: 200, data: { flightId: id, ...classification } });
  } catch (err) {
    next(err);
  }
});

/**
 * POST /flights
 *  201 -> creado
 *  409 -> numero_vuelo + fecha ya existe
 *  500 -> el motor falló y se hizo rollback
 */
router.post('/', async (req, res, next) => {
  try {
    const input = NewFlightSchema.parse(req.body);
    const result = await registerFlight(input);
    const code = REGISTRATION_STATUS[result.status];
    return res.status(code).json({ code, data: result });
  } catch (err) {
    next(err);
  }
});

export default router;
