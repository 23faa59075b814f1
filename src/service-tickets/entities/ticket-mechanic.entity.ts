import { Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { Mechanic } from '../../mechanics/entities/mechanic.entity';
import { ServiceTicket } from './service-ticket.entity';

/**
 * Ticket ↔ mechanic association. The composite primary key makes each pair
 * a set member, so concurrent duplicate inserts collapse into one row.
 */
@Entity('service_mechanic')
export class TicketMechanic {
  @PrimaryColumn({ name: 'service_ticket_id', type: 'integer' })
  ticketId!: number;

  @PrimaryColumn({ name: 'mechanic_id', type: 'integer' })
  mechanicId!: number;

  @ManyToOne(() => ServiceTicket, (ticket) => ticket.mechanicLinks, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'service_ticket_id' })
  ticket!: ServiceTicket;

  @ManyToOne(() => Mechanic, (mechanic) => mechanic.ticketLinks, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'mechanic_id' })
  mechanic!: Mechanic;
}
