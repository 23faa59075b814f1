import { ChildEntity, Column, OneToMany } from 'typeorm';
import { Account } from '../../accounts/entities/account.entity';
import { TicketMechanic } from '../../service-tickets/entities/ticket-mechanic.entity';

@ChildEntity('mechanic')
export class Mechanic extends Account {
  // Nullable at the table level: customer rows share the table.
  @Column({ type: 'varchar', length: 100, nullable: true })
  specialty!: string | null;

  @Column({ type: 'double precision', nullable: true })
  salary!: number | null;

  @OneToMany(() => TicketMechanic, (link) => link.mechanic)
  ticketLinks!: TicketMechanic[];
}
