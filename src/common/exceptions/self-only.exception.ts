import { ForbiddenException, HttpStatus } from '@nestjs/common';

/** An account may only change or delete itself. */
export class SelfOnlyException extends ForbiddenException {
  constructor() {
    super({
      statusCode: HttpStatus.FORBIDDEN,
      error: 'Forbidden',
      message: 'Unauthorized access',
    });
  }
}
