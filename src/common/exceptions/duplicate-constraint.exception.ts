import { BadRequestException, HttpStatus } from '@nestjs/common';

/**
 * Thrown by uniqueness pre-checks (email, phone, VIN, SKU, part name) so the
 * caller gets a clean 400 instead of a raw constraint violation.
 */
export class DuplicateConstraintException extends BadRequestException {
  constructor(message: string) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'Duplicate Constraint',
      message,
    });
  }
}
