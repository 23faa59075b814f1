import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Role } from '../common/decorators/roles.decorator';
import type { Principal } from '../common/interfaces/authenticated-request.interface';
import { Customer } from '../customers/entities/customer.entity';
import { Mechanic } from '../mechanics/entities/mechanic.entity';

/**
 * Maps a verified subject id to the role it acts as. Looked up on every
 * request so a deleted account loses access as soon as its row is gone.
 */
@Injectable()
export class RoleResolverService {
  constructor(
    @InjectRepository(Mechanic)
    private readonly mechanicRepository: Repository<Mechanic>,
    @InjectRepository(Customer)
    private readonly customerRepository: Repository<Customer>,
  ) {}

  resolveMechanic(id: number): Promise<Mechanic | null> {
    return this.mechanicRepository.findOneBy({ id });
  }

  resolveCustomer(id: number): Promise<Customer | null> {
    return this.customerRepository.findOneBy({ id });
  }

  /** Mechanic is tried first, then customer. */
  async resolve(id: number): Promise<Principal> {
    const mechanic = await this.resolveMechanic(id);
    if (mechanic) {
      return { kind: Role.MECHANIC, id, mechanic };
    }

    const customer = await this.resolveCustomer(id);
    if (customer) {
      return { kind: Role.CUSTOMER, id, customer };
    }

    return { kind: 'unauthenticated', id };
  }
}
