import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

/**
 * Bulk edit. Mechanic ids that do not exist are skipped and repeated ids
 * count once; the rest of the batch still applies.
 */
export class EditServiceTicketDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  description?: string;

  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  add_ids?: number[];

  @IsOptional()
  @IsArray()
  @IsInt({ each: true })
  remove_ids?: number[];
}
