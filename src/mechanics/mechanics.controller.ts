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
import { SelfOnlyException } from '../common/exceptions/self-only.exception';
import { ResponseCacheInterceptor } from '../common/interceptors/response-cache.interceptor';
import type { Principal } from '../common/interfaces/authenticated-request.interface';
import { mapPage, toPageRequest } from '../common/pagination/paginate';
import { PaginationQueryDto } from '../common/pagination/pagination-query.dto';
import {
  MechanicResponseDto,
  RankedMechanicResponseDto,
} from './dto/mechanic-response.dto';
import { CreateMechanicDto } from './dto/create-mechanic.dto';
import { UpdateMechanicDto } from './dto/update-mechanic.dto';
import { MechanicsService } from './mechanics.service';

@ApiTags('mechanics')
@Controller('mechanics')
export class MechanicsController {
  constructor(private readonly mechanicsService: MechanicsService) {}

  @Post()
  @Public()
  @RateTier('create')
  async create(@Body() dto: CreateMechanicDto) {
    const mechanic = await this.mechanicsService.create(dto);
    return MechanicResponseDto.fromEntity(mechanic);
  }

  @Post('login')
  @Public()
  @RateTier('create')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto) {
    return this.mechanicsService.login(dto.email, dto.password);
  }

  @Get()
  @Authenticated()
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findAll(@Query() query: PaginationQueryDto) {
    const page = await this.mechanicsService.findAll(toPageRequest(query));
    return mapPage(page, MechanicResponseDto.fromEntity);
  }

  @Get('top')
  @Public()
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findTop() {
    const ranked = await this.mechanicsService.findTop();
    return ranked.map(({ mechanic, ticketCount }) =>
      RankedMechanicResponseDto.fromRanked(mechanic, ticketCount),
    );
  }

  @Get(':id')
  @Authenticated()
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return MechanicResponseDto.fromEntity(
      await this.mechanicsService.findOne(id),
    );
  }

  @Put(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateMechanicDto,
    @CurrentPrincipal() principal: Principal,
  ) {
    if (principal.id !== id) throw new SelfOnlyException();
    const mechanic = await this.mechanicsService.update(id, dto);
    return MechanicResponseDto.fromEntity(mechanic);
  }

  @Delete(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @CurrentPrincipal() principal: Principal,
  ) {
    if (principal.id !== id) throw new SelfOnlyException();
    await this.mechanicsService.remove(id);
    return { message: `Mechanic with id ${id} deleted successfully.` };
  }
}
