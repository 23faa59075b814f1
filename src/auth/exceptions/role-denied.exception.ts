import { ForbiddenException, HttpStatus } from '@nestjs/common';
import { Role } from '../../common/decorators/roles.decorator';

export class RoleDeniedException extends ForbiddenException {
  constructor(allowed: Role[]) {
    super({
      statusCode: HttpStatus.FORBIDDEN,
      error: 'Forbidden',
      message: `Only ${allowed.map((role) => `${role}s`).join(' or ')} can perform this action`,
    });
  }
}
