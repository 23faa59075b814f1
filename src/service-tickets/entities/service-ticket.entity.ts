import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Customer } from '../../customers/entities/customer.entity';
import { TicketMechanic } from './ticket-mechanic.entity';
import { TicketPart } from './ticket-part.entity';

@Entity('service_tickets')
export class ServiceTicket {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  description!: string;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 17 })
  vin!: string;

  /** Owning customer. Only this customer may read the ticket. */
  @Column({ name: 'customer_id', type: 'integer' })
  customerId!: number;

  @ManyToOne(() => Customer, (customer) => customer.serviceTickets, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'customer_id' })
  customer!: Customer;

  @OneToMany(() => TicketMechanic, (link) => link.ticket)
  mechanicLinks!: TicketMechanic[];

  @OneToMany(() => TicketPart, (link) => link.ticket)
  partLinks!: TicketPart[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
