import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { AccountsService } from '../accounts/accounts.service';
import { hashPassword, verifyPassword } from '../accounts/password';
import { InvalidCredentialsException } from '../auth/exceptions';
import { TokenService } from '../auth/token.service';
import { Page, PageRequest, paginate } from '../common/pagination/paginate';
import { TicketMechanic } from '../service-tickets/entities/ticket-mechanic.entity';
import { CreateMechanicDto } from './dto/create-mechanic.dto';
import { UpdateMechanicDto } from './dto/update-mechanic.dto';
import { Mechanic } from './entities/mechanic.entity';

export interface MechanicLoginResult {
  message: string;
  token: string;
  mechanic_id: number;
  mechanic_name: string;
}

export interface RankedMechanic {
  mechanic: Mechanic;
  ticketCount: number;
}

@Injectable()
export class MechanicsService {
  private readonly logger = new Logger(MechanicsService.name);

  constructor(
    @InjectRepository(Mechanic)
    private readonly mechanicRepository: Repository<Mechanic>,
    private readonly accountsService: AccountsService,
    private readonly tokenService: TokenService,
    private readonly dataSource: DataSource,
  ) {}

  async create(dto: CreateMechanicDto): Promise<Mechanic> {
    await this.accountsService.assertUnique({
      email: dto.email,
      phone: dto.phone,
    });

    const mechanic = await this.mechanicRepository.save(
      this.mechanicRepository.create({
        ...dto,
        specialty: dto.specialty ?? null,
        salary: dto.salary ?? null,
        password: await hashPassword(dto.password),
      }),
    );
    this.logger.log(`Mechanic ${mechanic.id} registered`);
    return mechanic;
  }

  findAll(request: PageRequest): Promise<Page<Mechanic>> {
    return paginate(this.mechanicRepository, request, { order: { id: 'ASC' } });
  }

  async findOne(id: number): Promise<Mechanic> {
    const mechanic = await this.mechanicRepository.findOneBy({ id });
    if (!mechanic) {
      throw new NotFoundException(`Mechanic with id ${id} not found.`);
    }
    return mechanic;
  }

  async update(id: number, dto: UpdateMechanicDto): Promise<Mechanic> {
    const mechanic = await this.findOne(id);
    await this.accountsService.assertUnique(
      { email: dto.email, phone: dto.phone },
      id,
    );

    const { password, ...fields } = dto;
    Object.assign(mechanic, fields);
    if (password !== undefined) {
      mechanic.password = await hashPassword(password);
    }
    return this.mechanicRepository.save(mechanic);
  }

  /** Drops the mechanic's ticket assignments in the same transaction. */
  async remove(id: number): Promise<void> {
    await this.findOne(id);

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(TicketMechanic, { mechanicId: id });
      await manager.delete(Mechanic, { id });
    });
    this.logger.log(`Mechanic ${id} deleted`);
  }

  /**
   * Every mechanic, most assigned tickets first. Ties keep ascending id
   * order.
   */
  async findTop(): Promise<RankedMechanic[]> {
    const mechanics = await this.mechanicRepository.find({
      relations: { ticketLinks: true },
      order: { id: 'ASC' },
    });

    return mechanics
      .map((mechanic) => ({
        mechanic,
        ticketCount: mechanic.ticketLinks.length,
      }))
      .sort((a, b) => b.ticketCount - a.ticketCount);
  }

  async login(email: string, password: string): Promise<MechanicLoginResult> {
    const mechanic = await this.mechanicRepository.findOne({
      where: { email },
      select: { id: true, name: true, email: true, password: true },
    });

    const valid = await verifyPassword(password, mechanic?.password);
    if (!mechanic || !valid) {
      this.logger.warn('Mechanic login failed');
      throw new InvalidCredentialsException();
    }

    return {
      message: 'Login successful',
      token: this.tokenService.issue(mechanic.id),
      mechanic_id: mechanic.id,
      mechanic_name: mechanic.name,
    };
  }
}
