import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class UpdateServiceTicketDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  description!: string;
}
