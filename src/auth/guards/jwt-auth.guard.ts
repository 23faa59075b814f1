import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
} from '@nestjs/common';
import type { AuthenticatedRequest } from '../../common/interfaces/authenticated-request.interface';
import { RoleResolverService } from '../role-resolver.service';
import { TokenService, extractBearerToken } from '../token.service';

/**
 * Verifies the bearer token and attaches the resolved principal to
 * `req.user`. Role checks are left to RolesGuard, which runs after the
 * rate limiter.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly roleResolver: RoleResolverService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(req.headers.authorization);

    let subjectId: number;
    try {
      subjectId = this.tokenService.verify(token);
    } catch (error) {
      this.logger.warn(
        `Rejected ${req.method} ${req.originalUrl}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      throw error;
    }

    req.user = await this.roleResolver.resolve(subjectId);
    return true;
  }
}
