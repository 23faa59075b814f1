import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  TableInheritance,
} from 'typeorm';

/**
 * Shared identity record for customers and mechanics.
 *
 * Both roles live in one table and draw ids from one sequence, so a subject
 * id always belongs to exactly one role. The `kind` discriminator is managed
 * by TypeORM through the child entities.
 */
@Entity('accounts')
@TableInheritance({ column: { type: 'varchar', name: 'kind', length: 16 } })
export class Account {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 120 })
  email!: string;

  /**
   * bcrypt hash. Never selected unless asked for explicitly and never
   * exposed in API responses.
   */
  @Column({ type: 'varchar', length: 255, select: false })
  password!: string;

  @Column({ type: 'varchar', length: 200 })
  address!: string;

  @Column({ type: 'varchar', length: 20 })
  phone!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
