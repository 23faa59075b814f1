import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

/**
 * Quotas are counted per verified subject when the request carried a valid
 * token, otherwise per client address. Runs after JwtAuthGuard, so a request
 * with a bad token is rejected with 401 before it can use up a quota.
 */
@Injectable()
export class RateLimitGuard extends ThrottlerGuard {
  protected async getTracker(
    req: Partial<AuthenticatedRequest>,
  ): Promise<string> {
    if (req.user) {
      return `subject:${req.user.id}`;
    }
    return req.ip ?? 'unknown';
  }
}
