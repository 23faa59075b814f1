import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { QueryFailedError } from 'typeorm';

// Postgres SQLSTATE and better-sqlite3 codes for constraint violations.
const INTEGRITY_CODES = new Set([
  '23505',
  '23503',
  '23502',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_FOREIGNKEY',
  'SQLITE_CONSTRAINT_NOTNULL',
]);

export function isIntegrityViolation(error: QueryFailedError): boolean {
  const driverError = error.driverError;
  return (
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    INTEGRITY_CODES.has(driverError.code)
  );
}

/**
 * Maps storage failures that escape a service. By the time an error reaches
 * this filter the surrounding transaction has already been rolled back.
 */
@Catch(QueryFailedError)
export class QueryFailedFilter implements ExceptionFilter {
  private readonly logger = new Logger(QueryFailedFilter.name);

  catch(exception: QueryFailedError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (isIntegrityViolation(exception)) {
      this.logger.warn(`Integrity violation: ${exception.message}`);
      response.status(HttpStatus.BAD_REQUEST).json({
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Integrity Error',
        message: 'The request conflicts with existing data.',
      });
      return;
    }

    this.logger.error(`Storage failure: ${exception.message}`, exception.stack);
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'Database Error',
      message: 'The operation could not be completed. No changes were saved.',
    });
  }
}
