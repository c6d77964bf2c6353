import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { buildApp } from '../app';
import { paramsOf, poolMock, resetDbMocks, rows } from '../test/db-mock';

vi.mock('../db', async () => ({ default: (await import('../test/db-mock')).poolMock }));

describe('Reports Routes', () => {
  const app = buildApp();

  beforeEach(() => {
    resetDbMocks();
  });

  it('GET /reports/frequent-flyers applies the default threshold', async () => {
    poolMock.query.mockResolvedValueOnce(
      rows([{ id: 4, nombre: 'Ana', apellido: 'Quispe', total_vuelos: 12 }])
    );

    const res = await request(app).get('/reports/frequent-flyers');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual([1]);
    expect(res.body).toEqual({
      code: 200,
      data: [{ passengerId: 4, fullName: 'Ana Quispe', totalFlights: 12, tier: 'GOLD' }],
    });
  });

  it('GET /reports/route-profitability echoes the route and window', async () => {
    poolMock.query.mockResolvedValueOnce(
      rows([{ total_vuelos: 0, capacidad_total: null, pasajeros_total: null }])
    );

    const res = await request(app).get('/reports/route-profitability?originId=1&destinationId=2');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual([1, 2, 30]);
    expect(res.body).toEqual({
      code: 200,
      data: {
        originId: 1,
        destinationId: 2,
        days: 30,
        totalFlights: 0,
        totalPassengers: 0,
        averageOccupancy: 0,
        profitability: 'NOT_PROFITABLE',
      },
    });
  });

  it('GET /reports/route-profitability requires both airports', async () => {
    const res = await request(app).get('/reports/route-profitability?originId=1');

    expect(res.status).toBe(400);
    expect(res.body.errors).toBe('invalid_request');
    expect(res.body.details.issues[0].field).toBe('destinationId');
  });

  it('GET /reports/flight-occupancy passes the window and sorts by occupancy', async () => {
    poolMock.query.mockResolvedValueOnce(
      rows([
        { id: 3, numero_vuelo: 'AV300', fecha: '2024-05-02', capacidad_pasajeros: 200, pasajeros_registrados: 50 },
        { id: 8, numero_vuelo: 'AV800', fecha: '2024-05-03', capacidad_pasajeros: 100, pasajeros_registrados: 96 },
      ])
    );

    const res = await request(app).get('/reports/flight-occupancy?days=7');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual([7]);
    expect(res.body.data.map((f: { flightId: number }) => f.flightId)).toEqual([8, 3]);
  });

  it('GET /reports/baggage filters by flight when one is given', async () => {
    poolMock.query.mockResolvedValueOnce(
      rows([{ numero_vuelo: 'AV101', fecha: '2024-05-01', estado: 'EN_BODEGA', cantidad_equipaje: 4 }])
    );

    const res = await request(app).get('/reports/baggage?flightId=9');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual([9]);
    expect(res.body).toEqual({
      code: 200,
      data: [{ flightNumber: 'AV101', date: '2024-05-01', state: 'EN_BODEGA', count: 4 }],
    });
  });

  it('GET /reports/airlines/passengers passes the start date', async () => {
    poolMock.query.mockResolvedValueOnce(rows([]));

    const res = await request(app).get('/reports/airlines/passengers?since=2024-01-01');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual(['2024-01-01']);
    expect(res.body).toEqual({ code: 200, data: [] });
  });

  it('GET /reports/airports/origins applies the defaults', async () => {
    poolMock.query.mockResolvedValueOnce(rows([]));

    const res = await request(app).get('/reports/airports/origins');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual([30, 10]);
  });

  it('GET /reports/airports/busiest rejects a limit above 100', async () => {
    const res = await request(app).get('/reports/airports/busiest?limit=500');

    expect(res.status).toBe(400);
    expect(res.body.errors).toBe('invalid_request');
    expect(poolMock.query).not.toHaveBeenCalled();
  });

  it('GET /reports/monthly uses the given year', async () => {
    poolMock.query.mockResolvedValueOnce(rows([]));

    const res = await request(app).get('/reports/monthly?year=2023');

    expect(res.status).toBe(200);
    expect(paramsOf(poolMock.query, 0)).toEqual([2023]);
  });
});
