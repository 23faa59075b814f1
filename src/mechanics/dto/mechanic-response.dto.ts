import { Mechanic } from '../entities/mechanic.entity';

export class MechanicResponseDto {
  id!: number;
  name!: string;
  email!: string;
  phone!: string;
  address!: string;
  specialty!: string | null;
  salary!: number | null;

  static fromEntity(mechanic: Mechanic): MechanicResponseDto {
    const dto = new MechanicResponseDto();
    dto.id = mechanic.id;
    dto.name = mechanic.name;
    dto.email = mechanic.email;
    dto.phone = mechanic.phone;
    dto.address = mechanic.address;
    dto.specialty = mechanic.specialty;
    dto.salary = mechanic.salary;
    return dto;
  }
}

/** Entry of the top-mechanics ranking. */
export class RankedMechanicResponseDto extends MechanicResponseDto {
  ticket_count!: number;

  static fromRanked(
    mechanic: Mechanic,
    ticketCount: number,
  ): RankedMechanicResponseDto {
    const dto = Object.assign(
      new RankedMechanicResponseDto(),
      MechanicResponseDto.fromEntity(mechanic),
    );
    dto.ticket_count = ticketCount;
    return dto;
  }
}
