import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Authenticated } from '../auth/decorators/auth.decorator';
import { CurrentPrincipal } from '../auth/decorators/current-principal.decorator';
import { RateTier } from '../common/decorators/rate-tier.decorator';
import { Role } from '../common/decorators/roles.decorator';
import { ResponseCacheInterceptor } from '../common/interceptors/response-cache.interceptor';
import type { Principal } from '../common/interfaces/authenticated-request.interface';
import { mapPage, toPageRequest } from '../common/pagination/paginate';
import { PaginationQueryDto } from '../common/pagination/pagination-query.dto';
import { PartResponseDto } from '../inventory/dto/part-response.dto';
import { AddPartsDto } from './dto/add-parts.dto';
import { CreateServiceTicketDto } from './dto/create-service-ticket.dto';
import { EditServiceTicketDto } from './dto/edit-service-ticket.dto';
import { ServiceTicketResponseDto } from './dto/service-ticket-response.dto';
import { UpdateServiceTicketDto } from './dto/update-service-ticket.dto';
import { ServiceTicketsService } from './service-tickets.service';
import { TicketAssignmentsService } from './ticket-assignments.service';

@ApiTags('service-tickets')
@Controller('service-tickets')
export class ServiceTicketsController {
  constructor(
    private readonly ticketsService: ServiceTicketsService,
    private readonly assignmentsService: TicketAssignmentsService,
  ) {}

  @Post()
  @Authenticated(Role.MECHANIC)
  @RateTier('create')
  async create(@Body() dto: CreateServiceTicketDto) {
    const ticket = await this.ticketsService.create(dto);
    return {
      message: 'Service ticket created successfully.',
      ticket: ServiceTicketResponseDto.fromEntity(ticket),
    };
  }

  @Get()
  @Authenticated(Role.MECHANIC, Role.CUSTOMER)
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findAll(
    @Query() query: PaginationQueryDto,
    @CurrentPrincipal() principal: Principal,
  ) {
    const page = await this.ticketsService.findAll(
      principal,
      toPageRequest(query),
    );
    return mapPage(page, ServiceTicketResponseDto.fromEntity);
  }

  @Get(':id')
  @Authenticated(Role.MECHANIC, Role.CUSTOMER)
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findOne(
    @Param('id', ParseIntPipe) id: number,
    @CurrentPrincipal() principal: Principal,
  ) {
    const ticket = await this.ticketsService.findOne(id, principal);
    return ServiceTicketResponseDto.fromEntity(ticket);
  }

  @Put(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateServiceTicketDto,
  ) {
    const ticket = await this.ticketsService.update(id, dto);
    return {
      message: 'Service ticket updated successfully.',
      ticket: ServiceTicketResponseDto.fromEntity(ticket),
    };
  }

  @Delete(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.ticketsService.remove(id);
    return { message: `Service ticket with id ${id} deleted successfully.` };
  }

  @Put(':id/assign-mechanic/:mechanicId')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async assignMechanic(
    @Param('id', ParseIntPipe) id: number,
    @Param('mechanicId', ParseIntPipe) mechanicId: number,
  ) {
    const ticket = await this.assignmentsService.assignMechanic(id, mechanicId);
    return {
      message: 'Mechanic assigned successfully.',
      ticket: ServiceTicketResponseDto.fromEntity(ticket),
    };
  }

  @Delete(':id/remove-mechanic/:mechanicId')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async removeMechanic(
    @Param('id', ParseIntPipe) id: number,
    @Param('mechanicId', ParseIntPipe) mechanicId: number,
  ) {
    const ticket = await this.assignmentsService.removeMechanic(id, mechanicId);
    return {
      message: 'Mechanic removed successfully.',
      ticket: ServiceTicketResponseDto.fromEntity(ticket),
    };
  }

  @Put(':id/edit')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async edit(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: EditServiceTicketDto,
  ) {
    const ticket = await this.assignmentsService.bulkEdit(id, dto);
    return {
      message: 'Ticket updated successfully.',
      ticket: ServiceTicketResponseDto.fromEntity(ticket),
    };
  }

  @Post(':id/add-parts')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  @HttpCode(HttpStatus.OK)
  async addParts(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AddPartsDto,
  ) {
    const { added, ticket } = await this.assignmentsService.addParts(
      id,
      dto.part_ids,
    );
    return {
      message: `Added ${added} parts to service ticket ${id}`,
      added,
      parts: ServiceTicketResponseDto.fromEntity(ticket).parts,
    };
  }

  @Delete(':id/remove-part/:partId')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async removePart(
    @Param('id', ParseIntPipe) id: number,
    @Param('partId', ParseIntPipe) partId: number,
  ) {
    await this.assignmentsService.removePart(id, partId);
    return { message: `Part ${partId} removed from service ticket ${id}` };
  }

  @Get(':id/parts')
  @Authenticated(Role.MECHANIC, Role.CUSTOMER)
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async getParts(
    @Param('id', ParseIntPipe) id: number,
    @CurrentPrincipal() principal: Principal,
  ) {
    const parts = await this.ticketsService.getParts(id, principal);
    return {
      message: `Parts retrieved for service ticket ${id}`,
      parts: parts.map(PartResponseDto.fromEntity),
    };
  }
}
