import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, Not, Repository } from 'typeorm';
import { DuplicateConstraintException } from '../common/exceptions/duplicate-constraint.exception';
import { Page, PageRequest, paginate } from '../common/pagination/paginate';
import { TicketPart } from '../service-tickets/entities/ticket-part.entity';
import { CreatePartDto } from './dto/create-part.dto';
import { UpdatePartDto } from './dto/update-part.dto';
import { Part } from './entities/part.entity';

@Injectable()
export class InventoryService {
  private readonly logger = new Logger(InventoryService.name);

  constructor(
    @InjectRepository(Part)
    private readonly partRepository: Repository<Part>,
    private readonly dataSource: DataSource,
  ) {}

  async create(dto: CreatePartDto): Promise<Part> {
    await this.assertUnique(dto.name, dto.sku);

    const part = await this.partRepository.save(
      this.partRepository.create({
        ...dto,
        description: dto.description ?? null,
      }),
    );
    this.logger.log(`Part ${part.id} (${part.sku}) created`);
    return part;
  }

  findAll(request: PageRequest): Promise<Page<Part>> {
    return paginate(this.partRepository, request, { order: { id: 'ASC' } });
  }

  async findOne(id: number): Promise<Part> {
    const part = await this.partRepository.findOneBy({ id });
    if (!part) {
      throw new NotFoundException(`Part with id ${id} not found.`);
    }
    return part;
  }

  async update(id: number, dto: UpdatePartDto): Promise<Part> {
    const part = await this.findOne(id);
    await this.assertUnique(dto.name, dto.sku, id);

    Object.assign(part, dto);
    return this.partRepository.save(part);
  }

  async remove(id: number): Promise<void> {
    await this.findOne(id);

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(TicketPart, { partId: id });
      await manager.delete(Part, { id });
    });
    this.logger.log(`Part ${id} deleted`);
  }

  /** Name and SKU must each be unique across the inventory. */
  private async assertUnique(
    name: string | undefined,
    sku: string | undefined,
    excludeId?: number,
  ): Promise<void> {
    const scope: FindOptionsWhere<Part> =
      excludeId === undefined ? {} : { id: Not(excludeId) };

    if (name !== undefined && (await this.partRepository.existsBy({ ...scope, name }))) {
      throw new DuplicateConstraintException(
        excludeId === undefined
          ? 'Duplicate part with the same name exists'
          : 'Another part with the same name exists',
      );
    }
    if (sku !== undefined && (await this.partRepository.existsBy({ ...scope, sku }))) {
      throw new DuplicateConstraintException(
        excludeId === undefined
          ? 'Duplicate part with the same SKU exists'
          : 'Another part with the same SKU exists',
      );
    }
  }
}
