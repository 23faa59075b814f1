import { Customer } from '../entities/customer.entity';

/** Public view of a customer. Built field by field; the hash never leaks. */
export class CustomerResponseDto {
  id!: number;
  name!: string;
  email!: string;
  address!: string;
  phone!: string;

  static fromEntity(customer: Customer): CustomerResponseDto {
    const dto = new CustomerResponseDto();
    dto.id = customer.id;
    dto.name = customer.name;
    dto.email = customer.email;
    dto.address = customer.address;
    dto.phone = customer.phone;
    return dto;
  }
}
