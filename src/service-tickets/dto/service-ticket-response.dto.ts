import { PartResponseDto } from '../../inventory/dto/part-response.dto';
import { MechanicResponseDto } from '../../mechanics/dto/mechanic-response.dto';
import { ServiceTicket } from '../entities/service-ticket.entity';

export class ServiceTicketResponseDto {
  id!: number;
  description!: string;
  vin!: string;
  customer_id!: number;
  mechanics!: MechanicResponseDto[];
  parts!: PartResponseDto[];

  /**
   * Association lists are read from `mechanicLinks.mechanic` and
   * `partLinks.part`; when those relations were not loaded they come out
   * empty.
   */
  static fromEntity(ticket: ServiceTicket): ServiceTicketResponseDto {
    const dto = new ServiceTicketResponseDto();
    dto.id = ticket.id;
    dto.description = ticket.description;
    dto.vin = ticket.vin;
    dto.customer_id = ticket.customerId;
    dto.mechanics = (ticket.mechanicLinks ?? [])
      .map((link) => MechanicResponseDto.fromEntity(link.mechanic))
      .sort((a, b) => a.id - b.id);
    dto.parts = (ticket.partLinks ?? [])
      .map((link) => PartResponseDto.fromEntity(link.part))
      .sort((a, b) => a.id - b.id);
    return dto;
  }
}
