import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { TicketPart } from '../../service-tickets/entities/ticket-part.entity';

@Entity('inventory')
export class Part {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 50 })
  sku!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  description!: string | null;

  @Column({ type: 'double precision' })
  price!: number;

  @OneToMany(() => TicketPart, (link) => link.part)
  ticketLinks!: TicketPart[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
