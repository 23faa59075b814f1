import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { AccountsService } from '../accounts/accounts.service';
import { hashPassword, verifyPassword } from '../accounts/password';
import { InvalidCredentialsException } from '../auth/exceptions';
import { TokenService } from '../auth/token.service';
import { Page, PageRequest, paginate } from '../common/pagination/paginate';
import { ServiceTicket } from '../service-tickets/entities/service-ticket.entity';
import { TicketMechanic } from '../service-tickets/entities/ticket-mechanic.entity';
import { TicketPart } from '../service-tickets/entities/ticket-part.entity';
import { CreateCustomerDto } from './dto/create-customer.dto';
import { UpdateCustomerDto } from './dto/update-customer.dto';
import { Customer } from './entities/customer.entity';

export interface CustomerLoginResult {
  message: string;
  token: string;
  customer_id: number;
  customer_name: string;
}

@Injectable()
export class CustomersService {
  private readonly logger = new Logger(CustomersService.name);

  constructor(
    @InjectRepository(Customer)
    private readonly customerRepository: Repository<Customer>,
    private readonly accountsService: AccountsService,
    private readonly tokenService: TokenService,
    private readonly dataSource: DataSource,
  ) {}

  async create(dto: CreateCustomerDto): Promise<Customer> {
    await this.accountsService.assertUnique({
      email: dto.email,
      phone: dto.phone,
    });

    const customer = await this.customerRepository.save(
      this.customerRepository.create({
        ...dto,
        password: await hashPassword(dto.password),
      }),
    );
    this.logger.log(`Customer ${customer.id} registered`);
    return customer;
  }

  findAll(request: PageRequest): Promise<Page<Customer>> {
    return paginate(this.customerRepository, request, { order: { id: 'ASC' } });
  }

  async findOne(id: number): Promise<Customer> {
    const customer = await this.customerRepository.findOneBy({ id });
    if (!customer) {
      throw new NotFoundException(`Customer with id ${id} not found.`);
    }
    return customer;
  }

  async update(id: number, dto: UpdateCustomerDto): Promise<Customer> {
    const customer = await this.findOne(id);
    await this.accountsService.assertUnique(
      { email: dto.email, phone: dto.phone },
      id,
    );

    const { password, ...fields } = dto;
    Object.assign(customer, fields);
    if (password !== undefined) {
      customer.password = await hashPassword(password);
    }
    return this.customerRepository.save(customer);
  }

  /** Deletes the customer together with their tickets and those tickets' links. */
  async remove(id: number): Promise<void> {
    await this.findOne(id);

    await this.dataSource.transaction(async (manager) => {
      const tickets = await manager.find(ServiceTicket, {
        where: { customerId: id },
        select: { id: true },
      });
      const ticketIds = tickets.map((ticket) => ticket.id);
      if (ticketIds.length > 0) {
        await manager.delete(TicketMechanic, { ticketId: In(ticketIds) });
        await manager.delete(TicketPart, { ticketId: In(ticketIds) });
        await manager.delete(ServiceTicket, { id: In(ticketIds) });
      }
      await manager.delete(Customer, { id });
    });
    this.logger.log(`Customer ${id} deleted`);
  }

  async login(email: string, password: string): Promise<CustomerLoginResult> {
    const customer = await this.customerRepository.findOne({
      where: { email },
      select: { id: true, name: true, email: true, password: true },
    });

    const valid = await verifyPassword(password, customer?.password);
    if (!customer || !valid) {
      this.logger.warn('Customer login failed');
      throw new InvalidCredentialsException();
    }

    return {
      message: 'Login successful',
      token: this.tokenService.issue(customer.id),
      customer_id: customer.id,
      customer_name: customer.name,
    };
  }
}
