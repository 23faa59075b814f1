import { SetMetadata } from '@nestjs/common';

export enum Role {
  MECHANIC = 'mechanic',
  CUSTOMER = 'customer',
}

export const ROLES_KEY = 'roles';

export const Roles = (...roles: Role[]) => SetMetadata(ROLES_KEY, roles);
