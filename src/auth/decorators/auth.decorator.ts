import { UseGuards, applyDecorators } from '@nestjs/common';
import { ApiBearerAuth } from '@nestjs/swagger';
import { Role, Roles } from '../../common/decorators/roles.decorator';
import { RateLimitGuard } from '../../common/guards/rate-limit.guard';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { RolesGuard } from '../guards/roles.guard';

const ANY_ROLE = [Role.MECHANIC, Role.CUSTOMER];

/**
 * Token required, and the principal must act as one of `roles`. Without
 * roles, any mechanic or customer passes; a token whose account is gone
 * does not.
 *
 * Guards run in order: token, rate limit, role.
 */
export const Authenticated = (...roles: Role[]) =>
  applyDecorators(
    Roles(...(roles.length > 0 ? roles : ANY_ROLE)),
    UseGuards(JwtAuthGuard, RateLimitGuard, RolesGuard),
    ApiBearerAuth(),
  );

/** No token; quota is tracked by client address. */
export const Public = () => applyDecorators(UseGuards(RateLimitGuard));
