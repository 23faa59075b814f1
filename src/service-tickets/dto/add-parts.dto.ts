import { IsArray, IsInt } from 'class-validator';

export class AddPartsDto {
  @IsArray()
  @IsInt({ each: true })
  part_ids!: number[];
}
