import { HttpStatus, UnauthorizedException } from '@nestjs/common';

/**
 * The three token failures stay distinct so clients can tell "log in" from
 * "log in again" from "this token was never valid".
 */
export class TokenMissingException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'Token Missing',
      message: 'Authentication token is missing',
    });
  }
}

export class TokenExpiredException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'Token Expired',
      message: 'Authentication token has expired',
    });
  }
}

export class TokenInvalidException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: HttpStatus.UNAUTHORIZED,
      error: 'Token Invalid',
      message: 'Invalid authentication token',
    });
  }
}
