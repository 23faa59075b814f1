import { HttpStatus, NotFoundException } from '@nestjs/common';

/** None of the ids in a batch referred to an existing record. */
export class NoValidTargetException extends NotFoundException {
  constructor(message: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'No Valid Target',
      message,
    });
  }
}

/** Both records exist but are not linked. */
export class NotAssociatedException extends NotFoundException {
  constructor(message: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Associated',
      message,
    });
  }
}
