import { IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { CreateCustomerDto } from '../../customers/dto/create-customer.dto';

/** Same identity fields as a customer, plus the mechanic's job details. */
export class CreateMechanicDto extends CreateCustomerDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  specialty?: string;

  @IsOptional()
  @IsNumber()
  @Min(0, { message: 'Salary must be zero or positive' })
  salary?: number;
}
