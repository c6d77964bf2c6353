import { Router } from 'express';
import {
  AirlineSummaryQuerySchema,
  BaggageQuerySchema,
  BusiestAirportsQuerySchema,
  FlightOccupancyQuerySchema,
  FrequentFlyersQuerySchema,
  MonthlyFlightsQuerySchema,
  OriginAirportsQuerySchema,
  RouteProfitabilityQuerySchema,
} from '../schemas';
import {
  airlinePassengerStats,
  airlineSummary,
  baggageByState,
  busiestAirports,
  busyOriginAirports,
  flightOccupancy,
  flightStatusBreakdown,
  monthlyFlights,
} from '../services/operations';
import { frequentFlyers, routeProfitability } from '../services/reports';

const router = Router();

router.get('/frequent-flyers', async (req, res, next) => {
  try {
    const { minFlights } = FrequentFlyersQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await frequentFlyers(minFlights) });
  } catch (err) {
    next(err);
  }
});

router.get('/route-profitability', async (req, res, next) => {
  try {
    const { originId, destinationId, days } = RouteProfitabilityQuerySchema.parse(req.query);
    const analysis = await routeProfitability(originId, destinationId, days);
    return res.json({ code: 200, data: { originId, destinationId, days, ...analysis } });
  } catch (err) {
    next(err);
  }
});

router.get('/airlines', async (req, res, next) => {
  try {
    const { since } = AirlineSummaryQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await airlineSummary(since) });
  } catch (err) {
    next(err);
  }
});

router.get('/flight-status', async (_req, res, next) => {
  try {
    return res.json({ code: 200, data: await flightStatusBreakdown() });
  } catch (err) {
    next(err);
  }
});

router.get('/airports/busiest', async (req, res, next) => {
  try {
    const { limit } = BusiestAirportsQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await busiestAirports(limit) });
  } catch (err) {
    next(err);
  }
});

router.get('/monthly', async (req, res, next) => {
  try {
    const { year } = MonthlyFlightsQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await monthlyFlights(year ?? new Date().getFullYear()) });
  } catch (err) {
    next(err);
  }
});

router.get('/airlines/passengers', async (req, res, next) => {
  try {
    const { since } = AirlineSummaryQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await airlinePassengerStats(since) });
  } catch (err) {
    next(err);
  }
});

router.get('/flight-occupancy', async (req, res, next) => {
  try {
    const { days } = FlightOccupancyQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await flightOccupancy(days) });
  } catch (err) {
    next(err);
  }
});

router.get('/baggage', async (req, res, next) => {
  try {
    const { flightId } = BaggageQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await baggageByState(flightId) });
  } catch (err) {
    next(err);
  }
});

router.get('/airports/origins', async (req, res, next) => {
  try {
    const { days, minDepartures } = OriginAirportsQuerySchema.parse(req.query);
    return res.json({ code: 200, data: await busyOriginAirports(days, minDepartures) });
  } catch (err) {
    next(err);
  }
});

export default router;
