import { FindOptionsRelations } from 'typeorm';
import { ServiceTicket } from './entities/service-ticket.entity';

/** Relations needed to render a ticket with its mechanics and parts. */
export const TICKET_RELATIONS = {
  mechanicLinks: { mechanic: true },
  partLinks: { part: true },
} satisfies FindOptionsRelations<ServiceTicket>;
