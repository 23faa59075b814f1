import { ChildEntity, OneToMany } from 'typeorm';
import { Account } from '../../accounts/entities/account.entity';
import { ServiceTicket } from '../../service-tickets/entities/service-ticket.entity';

@ChildEntity('customer')
export class Customer extends Account {
  @OneToMany(() => ServiceTicket, (ticket) => ticket.customer)
  serviceTickets!: ServiceTicket[];
}
