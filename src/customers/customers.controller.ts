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
import { Authenticated, Public } from '../auth/decorators/auth.decorator';
import { CurrentPrincipal } from '../auth/decorators/current-principal.decorator';
import { LoginDto } from '../auth/dto/login.dto';
import { RateTier } from '../common/decorators/rate-tier.decorator';
import { Role } from '../common/decorators/roles.decorator';
import { ResponseCacheInterceptor } from '../common/interceptors/response-cache.interceptor';
import type { Principal } from '../common/interfaces/authenticated-request.interface';
import { mapPage, toPageRequest } from '../common/pagination/paginate';
import { PaginationQueryDto } from '../common/pagination/pagination-query.dto';
import { ServiceTicketResponseDto } from '../service-tickets/dto/service-ticket-response.dto';
import { ServiceTicketsService } from '../service-tickets/service-tickets.service';
import { CreateCustomerDto } from './dto/create-customer.dto';
import { CustomerResponseDto } from './dto/customer-response.dto';
import { MyTicketsQueryDto } from './dto/my-tickets-query.dto';
import { UpdateCustomerDto } from './dto/update-customer.dto';
import { CustomersService } from './customers.service';
import { SelfOnlyException } from '../common/exceptions/self-only.exception';

@ApiTags('customers')
@Controller('customers')
export class CustomersController {
  constructor(
    private readonly customersService: CustomersService,
    private readonly ticketsService: ServiceTicketsService,
  ) {}

  @Post()
  @Public()
  @RateTier('create')
  async create(@Body() dto: CreateCustomerDto) {
    const customer = await this.customersService.create(dto);
    return CustomerResponseDto.fromEntity(customer);
  }

  @Post('login')
  @Public()
  @RateTier('create')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto) {
    return this.customersService.login(dto.email, dto.password);
  }

  @Get()
  @Authenticated()
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findAll(@Query() query: PaginationQueryDto) {
    const page = await this.customersService.findAll(toPageRequest(query));
    return mapPage(page, CustomerResponseDto.fromEntity);
  }

  /** Declared before `:id` so the literal segment wins. */
  @Get('my-tickets')
  @Authenticated(Role.CUSTOMER)
  @RateTier('read')
  async myTickets(
    @Query() query: MyTicketsQueryDto,
    @CurrentPrincipal() principal: Principal,
  ) {
    const tickets = await this.ticketsService.findByCustomer(principal.id);
    if (query.summaryOnly) {
      return tickets.map((ticket) => ticket.id);
    }
    return tickets.map(ServiceTicketResponseDto.fromEntity);
  }

  @Get(':id')
  @Authenticated()
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return CustomerResponseDto.fromEntity(
      await this.customersService.findOne(id),
    );
  }

  @Put(':id')
  @Authenticated(Role.CUSTOMER)
  @RateTier('read')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateCustomerDto,
    @CurrentPrincipal() principal: Principal,
  ) {
    if (principal.id !== id) throw new SelfOnlyException();
    const customer = await this.customersService.update(id, dto);
    return CustomerResponseDto.fromEntity(customer);
  }

  @Delete(':id')
  @Authenticated(Role.CUSTOMER)
  @RateTier('read')
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @CurrentPrincipal() principal: Principal,
  ) {
    if (principal.id !== id) throw new SelfOnlyException();
    await this.customersService.remove(id);
    return { message: `Customer with id ${id} deleted successfully.` };
  }
}
