import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { buildApp } from '../app';
import { connectionMock, insertResult, paramsOf, resetDbMocks, rows } from '../test/db-mock';

vi.mock('../db', async () => ({ default: (await import('../test/db-mock')).poolMock }));

describe('Boarding Routes', () => {
  const app = buildApp();

  beforeEach(() => {
    resetDbMocks();
  });

  it('returns the incremented counter the client sent', async () => {
    connectionMock.query
      .mockResolvedValueOnce(rows([{ total: 1 }]))
      .mockResolvedValueOnce(insertResult(300))
      .mockResolvedValueOnce(insertResult(900));

    const res = await request(app)
      .post('/boarding')
      .send({ ticketId: 11, flightId: 1, gateId: 5, processed: 2 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ code: 200, data: { registered: true, processed: 3 } });
    expect(paramsOf(connectionMock.query, 2)).toEqual([
      'SISTEMA',
      'embarque',
      11,
      'INSERT',
      'Boarding processed. Total: 3',
    ]);
  });

  it('starts the counter at 0 when the client sends none', async () => {
    connectionMock.query
      .mockResolvedValueOnce(rows([{ total: 1 }]))
      .mockResolvedValueOnce(insertResult(300))
      .mockResolvedValueOnce(insertResult(900));

    const res = await request(app).post('/boarding').send({ ticketId: 11, flightId: 1, gateId: 5 });

    expect(res.body).toEqual({ code: 200, data: { registered: true, processed: 1 } });
  });

  it('returns the counter unchanged when the ticket is not on the flight', async () => {
    connectionMock.query.mockResolvedValueOnce(rows([{ total: 0 }]));

    const res = await request(app)
      .post('/boarding')
      .send({ ticketId: 99, flightId: 1, gateId: 5, processed: 2 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ code: 200, data: { registered: false, processed: 2 } });
    expect(connectionMock.query).toHaveBeenCalledTimes(1);
  });

  it('rejects unknown fields with 400', async () => {
    const res = await request(app)
      .post('/boarding')
      .send({ ticketId: 11, flightId: 1, gateId: 5, seat: '12A' });

    expect(res.status).toBe(400);
    expect(res.body.code).toBe(400);
    expect(res.body.errors).toBe('invalid_request');
    expect(connectionMock.query).not.toHaveBeenCalled();
  });

  it('answers 500 and rolls back when the log insert fails', async () => {
    connectionMock.query
      .mockResolvedValueOnce(rows([{ total: 1 }]))
      .mockResolvedValueOnce(insertResult(300))
      .mockRejectedValueOnce(new Error('ER_LOCK_WAIT_TIMEOUT'));

    const res = await request(app)
      .post('/boarding')
      .send({ ticketId: 11, flightId: 1, gateId: 5, processed: 2 });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ code: 500, errors: 'unexpected_error' });
    expect(connectionMock.rollback).toHaveBeenCalledTimes(1);
  });
});
