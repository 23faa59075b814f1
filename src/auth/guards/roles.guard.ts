import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY, Role } from '../../common/decorators/roles.decorator';
import type { Principal } from '../../common/interfaces/authenticated-request.interface';
import { RoleDeniedException } from '../exceptions';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<Role[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const { user } = context
      .switchToHttp()
      .getRequest<{ user?: Principal | null }>();

    if (
      !user ||
      user.kind === 'unauthenticated' ||
      !requiredRoles.includes(user.kind)
    ) {
      throw new RoleDeniedException(requiredRoles);
    }

    return true;
  }
}
