import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, Repository } from 'typeorm';
import { RoleDeniedException } from '../auth/exceptions';
import { Role } from '../common/decorators/roles.decorator';
import { DuplicateConstraintException } from '../common/exceptions/duplicate-constraint.exception';
import type { Principal } from '../common/interfaces/authenticated-request.interface';
import { Page, PageRequest, paginate } from '../common/pagination/paginate';
import { Customer } from '../customers/entities/customer.entity';
import { Part } from '../inventory/entities/part.entity';
import { CreateServiceTicketDto } from './dto/create-service-ticket.dto';
import { UpdateServiceTicketDto } from './dto/update-service-ticket.dto';
import { ServiceTicket } from './entities/service-ticket.entity';
import { TicketMechanic } from './entities/ticket-mechanic.entity';
import { TicketPart } from './entities/ticket-part.entity';
import { TicketAccessDeniedException } from './exceptions/ticket-access-denied.exception';
import { TICKET_RELATIONS } from './ticket-relations';

@Injectable()
export class ServiceTicketsService {
  private readonly logger = new Logger(ServiceTicketsService.name);

  constructor(
    @InjectRepository(ServiceTicket)
    private readonly ticketRepository: Repository<ServiceTicket>,
    @InjectRepository(Customer)
    private readonly customerRepository: Repository<Customer>,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * The VIN is checked before the insert so a duplicate gets a specific
   * message; the unique index still catches a concurrent duplicate, which
   * then surfaces as an integrity error.
   */
  async create(dto: CreateServiceTicketDto): Promise<ServiceTicket> {
    if (await this.ticketRepository.existsBy({ vin: dto.vin })) {
      throw new DuplicateConstraintException(
        'A service ticket with this VIN already exists.',
      );
    }
    if (!(await this.customerRepository.existsBy({ id: dto.customer_id }))) {
      throw new NotFoundException(
        `Customer with id ${dto.customer_id} not found.`,
      );
    }

    const ticket = await this.ticketRepository.save(
      this.ticketRepository.create({
        description: dto.description,
        vin: dto.vin,
        customerId: dto.customer_id,
      }),
    );
    this.logger.log(
      `Service ticket ${ticket.id} created for customer ${ticket.customerId}`,
    );
    return this.findTicketOrFail(ticket.id);
  }

  /** Mechanics see every ticket, customers only their own. */
  async findAll(
    principal: Principal,
    request: PageRequest,
  ): Promise<Page<ServiceTicket>> {
    const where: FindOptionsWhere<ServiceTicket> = {};
    if (principal.kind === Role.CUSTOMER) {
      where.customerId = principal.id;
    } else if (principal.kind !== Role.MECHANIC) {
      throw new RoleDeniedException([Role.MECHANIC, Role.CUSTOMER]);
    }

    return paginate(this.ticketRepository, request, {
      where,
      relations: TICKET_RELATIONS,
      order: { id: 'ASC' },
    });
  }

  async findOne(id: number, principal: Principal): Promise<ServiceTicket> {
    const ticket = await this.findTicketOrFail(id);
    this.assertCanRead(ticket, principal);
    return ticket;
  }

  findByCustomer(customerId: number): Promise<ServiceTicket[]> {
    return this.ticketRepository.find({
      where: { customerId },
      relations: TICKET_RELATIONS,
      order: { id: 'ASC' },
    });
  }

  async update(
    id: number,
    dto: UpdateServiceTicketDto,
  ): Promise<ServiceTicket> {
    const ticket = await this.findTicketOrFail(id);
    ticket.description = dto.description;
    await this.ticketRepository.update({ id }, { description: dto.description });
    return ticket;
  }

  async remove(id: number): Promise<void> {
    await this.findTicketOrFail(id);

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(TicketMechanic, { ticketId: id });
      await manager.delete(TicketPart, { ticketId: id });
      await manager.delete(ServiceTicket, { id });
    });
    this.logger.log(`Service ticket ${id} deleted`);
  }

  async getParts(id: number, principal: Principal): Promise<Part[]> {
    const ticket = await this.findOne(id, principal);
    return ticket.partLinks
      .map((link) => link.part)
      .sort((a, b) => a.id - b.id);
  }

  async findTicketOrFail(id: number): Promise<ServiceTicket> {
    const ticket = await this.ticketRepository.findOne({
      where: { id },
      relations: TICKET_RELATIONS,
    });
    if (!ticket) {
      throw new NotFoundException(`Service ticket with id ${id} not found.`);
    }
    return ticket;
  }

  /** Re-evaluated on every read; nothing about ownership is cached. */
  private assertCanRead(ticket: ServiceTicket, principal: Principal): void {
    if (principal.kind === Role.MECHANIC) return;

    if (principal.kind === Role.CUSTOMER) {
      if (ticket.customerId !== principal.id) {
        this.logger.warn(
          `Customer ${principal.id} denied access to ticket ${ticket.id}`,
        );
        throw new TicketAccessDeniedException();
      }
      return;
    }

    throw new RoleDeniedException([Role.MECHANIC, Role.CUSTOMER]);
  }
}
