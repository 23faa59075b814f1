import type { Request } from 'express';
import { Role } from '../decorators/roles.decorator';
import type { Customer } from '../../customers/entities/customer.entity';
import type { Mechanic } from '../../mechanics/entities/mechanic.entity';

export interface MechanicPrincipal {
  kind: Role.MECHANIC;
  id: number;
  mechanic: Mechanic;
}

export interface CustomerPrincipal {
  kind: Role.CUSTOMER;
  id: number;
  customer: Customer;
}

/** A verified token whose subject no longer maps to any account. */
export interface UnauthenticatedPrincipal {
  kind: 'unauthenticated';
  id: number;
}

export type Principal =
  | MechanicPrincipal
  | CustomerPrincipal
  | UnauthenticatedPrincipal;

/**
 * Express request after JwtAuthGuard ran. `user` is resolved from the token's
 * subject on every request; it is never taken from the request body.
 */
export interface AuthenticatedRequest extends Request {
  user: Principal;
}
