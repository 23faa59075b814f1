import { randomUUID } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import {
  TokenExpiredException,
  TokenInvalidException,
  TokenMissingException,
} from './exceptions';
import type { JwtPayload } from './interfaces/jwt-payload.interface';

/**
 * Issues and verifies bearer tokens.
 *
 * Stateless: the signing key and lifetime are fixed when JwtModule is
 * registered at start-up, so any instance holding the same key can verify
 * any token. There is no revocation; expiry is the only way a token dies.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(private readonly jwtService: JwtService) {}

  issue(subjectId: number): string {
    const payload: JwtPayload = { sub: String(subjectId) };
    // jti keeps two tokens issued within the same second distinct.
    return this.jwtService.sign(payload, { jwtid: randomUUID() });
  }

  /**
   * Returns the subject id of a valid, unexpired token.
   *
   * @throws TokenMissingException when no token was supplied
   * @throws TokenExpiredException when the signature is valid but `exp` passed
   * @throws TokenInvalidException for any other failure
   */
  verify(token: string | undefined): number {
    if (!token) {
      throw new TokenMissingException();
    }

    let payload: JwtPayload;
    try {
      payload = this.jwtService.verify<JwtPayload>(token);
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        throw new TokenExpiredException();
      }
      this.logger.debug(
        `Token rejected: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new TokenInvalidException();
    }

    const subjectId = Number(payload.sub);
    if (!Number.isSafeInteger(subjectId) || subjectId < 1) {
      throw new TokenInvalidException();
    }
    return subjectId;
  }
}

/**
 * Pulls the token out of an `Authorization: Bearer <token>` header.
 * A header in any other shape yields an empty string, which verifies as
 * invalid rather than missing.
 */
export function extractBearerToken(
  header: string | undefined,
): string | undefined {
  if (header === undefined) return undefined;

  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : '';
}
