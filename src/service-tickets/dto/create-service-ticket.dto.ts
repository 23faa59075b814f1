import { IsInt, IsNotEmpty, IsString, MaxLength, Min } from 'class-validator';

export class CreateServiceTicketDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  description!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(17)
  vin!: string;

  @IsInt()
  @Min(1)
  customer_id!: number;
}
