import { Part } from '../entities/part.entity';

export class PartResponseDto {
  id!: number;
  name!: string;
  sku!: string;
  description!: string | null;
  price!: number;

  static fromEntity(part: Part): PartResponseDto {
    const dto = new PartResponseDto();
    dto.id = part.id;
    dto.name = part.name;
    dto.sku = part.sku;
    dto.description = part.description ?? null;
    dto.price = part.price;
    return dto;
  }
}
