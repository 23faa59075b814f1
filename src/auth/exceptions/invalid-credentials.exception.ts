import { HttpStatus, UnauthorizedException } from '@nestjs/common';

/** Deliberately vague: does not reveal whether the email exists. */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'Unauthorized',
      message: 'Invalid credentials',
    });
  }
}
