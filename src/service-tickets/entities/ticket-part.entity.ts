import { Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { Part } from '../../inventory/entities/part.entity';
import { ServiceTicket } from './service-ticket.entity';

/** Ticket ↔ part association, keyed on the pair. */
@Entity('service_inventory')
export class TicketPart {
  @PrimaryColumn({ name: 'service_ticket_id', type: 'integer' })
  ticketId!: number;

  @PrimaryColumn({ name: 'inventory_id', type: 'integer' })
  partId!: number;

  @ManyToOne(() => ServiceTicket, (ticket) => ticket.partLinks, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'service_ticket_id' })
  ticket!: ServiceTicket;

  @ManyToOne(() => Part, (part) => part.ticketLinks, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'inventory_id' })
  part!: Part;
}
