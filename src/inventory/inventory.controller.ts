import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Authenticated } from '../auth/decorators/auth.decorator';
import { RateTier } from '../common/decorators/rate-tier.decorator';
import { Role } from '../common/decorators/roles.decorator';
import { ResponseCacheInterceptor } from '../common/interceptors/response-cache.interceptor';
import { mapPage, toPageRequest } from '../common/pagination/paginate';
import { PaginationQueryDto } from '../common/pagination/pagination-query.dto';
import { CreatePartDto } from './dto/create-part.dto';
import { PartResponseDto } from './dto/part-response.dto';
import { UpdatePartDto } from './dto/update-part.dto';
import { InventoryService } from './inventory.service';

@ApiTags('inventory')
@Controller('inventory')
export class InventoryController {
  constructor(private readonly inventoryService: InventoryService) {}

  @Post()
  @Authenticated(Role.MECHANIC)
  @RateTier('create')
  async create(@Body() dto: CreatePartDto) {
    const part = await this.inventoryService.create(dto);
    return {
      message: 'Part created successfully',
      part: PartResponseDto.fromEntity(part),
    };
  }

  @Get()
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findAll(@Query() query: PaginationQueryDto) {
    const page = await this.inventoryService.findAll(toPageRequest(query));
    return mapPage(page, PartResponseDto.fromEntity);
  }

  @Get(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  @UseInterceptors(ResponseCacheInterceptor)
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return PartResponseDto.fromEntity(await this.inventoryService.findOne(id));
  }

  @Put(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdatePartDto,
  ) {
    const part = await this.inventoryService.update(id, dto);
    return {
      message: 'Part updated successfully',
      part: PartResponseDto.fromEntity(part),
    };
  }

  @Delete(':id')
  @Authenticated(Role.MECHANIC)
  @RateTier('read')
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.inventoryService.remove(id);
    return { message: `Part with id ${id} deleted successfully.` };
  }
}
