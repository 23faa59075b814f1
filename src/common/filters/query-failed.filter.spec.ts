import { ArgumentsHost } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { QueryFailedFilter, isIntegrityViolation } from './query-failed.filter';

function driverError(code: string): Error {
  return Object.assign(new Error('driver failure'), { code });
}

function mockHost() {
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  const host = {
    switchToHttp: () => ({ getResponse: () => ({ status }) }),
  } as unknown as ArgumentsHost;
  return { host, status, json };
}

describe('QueryFailedFilter', () => {
  const filter = new QueryFailedFilter();

  it.each(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY'])(
    'treats %s as an integrity violation',
    (code) => {
      const error = new QueryFailedError('INSERT', [], driverError(code));
      expect(isIntegrityViolation(error)).toBe(true);
    },
  );

  it('maps integrity violations to 400', () => {
    const { host, status, json } = mockHost();

    filter.catch(
      new QueryFailedError('INSERT', [], driverError('23505')),
      host,
    );

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'Integrity Error',
      message: 'The request conflicts with existing data.',
    });
  });

  it('maps other storage failures to 500', () => {
    const { host, status, json } = mockHost();

    filter.catch(
      new QueryFailedError('SELECT', [], driverError('57P01')),
      host,
    );

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({
      statusCode: 500,
      error: 'Database Error',
      message: 'The operation could not be completed. No changes were saved.',
    });
  });
});
