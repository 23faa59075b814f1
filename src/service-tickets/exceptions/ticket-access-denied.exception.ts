import { ForbiddenException, HttpStatus } from '@nestjs/common';

export class TicketAccessDeniedException extends ForbiddenException {
  constructor() {
    super({
      statusCode: HttpStatus.FORBIDDEN,
      error: 'Forbidden',
      message: 'Access denied: This ticket does not belong to you',
    });
  }
}
