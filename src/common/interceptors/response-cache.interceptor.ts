import { CacheInterceptor } from '@nestjs/cache-manager';
import { ExecutionContext, Injectable } from '@nestjs/common';
import type { Principal } from '../interfaces/authenticated-request.interface';

export function callerKey(user: Principal | undefined): string {
  return user ? `${user.kind}:${user.id}` : 'public';
}

/**
 * Caches GET responses by caller and full URL (path plus query string).
 * Entries live for the configured TTL; writes do not evict them, so a read
 * within the TTL after a write may return the earlier body.
 */
@Injectable()
export class ResponseCacheInterceptor extends CacheInterceptor {
  protected trackBy(context: ExecutionContext): string | undefined {
    const req = context
      .switchToHttp()
      .getRequest<{ method: string; originalUrl: string; user?: Principal }>();

    if (req.method !== 'GET') {
      return undefined;
    }
    return `${callerKey(req.user)}:${req.originalUrl}`;
  }
}
