import { beforeEach, describe, expect, it, vi } from 'vitest';
import { connectionMock, poolMock, resetDbMocks } from '../test/db-mock';
import { withTransaction } from './transaction';

vi.mock('../db', async () => ({ default: (await import('../test/db-mock')).poolMock }));

describe('withTransaction', () => {
  beforeEach(() => {
    resetDbMocks();
  });

  it('commits and releases after the work resolves', async () => {
    const result = await withTransaction(async () => 'done');

    expect(result).toBe('done');
    expect(poolMock.getConnection).toHaveBeenCalledTimes(1);
    expect(connectionMock.beginTransaction).toHaveBeenCalledTimes(1);
    expect(connectionMock.commit).toHaveBeenCalledTimes(1);
    expect(connectionMock.rollback).not.toHaveBeenCalled();
    expect(connectionMock.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back, releases and rethrows when the work fails', async () => {
    const failure = new Error('boom');

    await expect(
      withTransaction(async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(connectionMock.commit).not.toHaveBeenCalled();
    expect(connectionMock.rollback).toHaveBeenCalledTimes(1);
    expect(connectionMock.release).toHaveBeenCalledTimes(1);
  });

  it('rethrows the original error when the rollback also fails', async () => {
    const failure = new Error('ER_LOCK_DEADLOCK');
    connectionMock.rollback.mockRejectedValueOnce(new Error('PROTOCOL_CONNECTION_LOST'));

    await expect(
      withTransaction(async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(connectionMock.rollback).toHaveBeenCalledTimes(1);
    expect(connectionMock.release).toHaveBeenCalledTimes(1);
  });
});
