import { ExecutionContext, createParamDecorator } from '@nestjs/common';
import type {
  AuthenticatedRequest,
  Principal,
} from '../../common/interfaces/authenticated-request.interface';

/** The principal JwtAuthGuard resolved for this request. */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Principal =>
    context.switchToHttp().getRequest<AuthenticatedRequest>().user,
);
