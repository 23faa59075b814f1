import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DataSource, EntityManager, In } from 'typeorm';
import { Part } from '../inventory/entities/part.entity';
import { Mechanic } from '../mechanics/entities/mechanic.entity';
import { EditServiceTicketDto } from './dto/edit-service-ticket.dto';
import { ServiceTicket } from './entities/service-ticket.entity';
import { TicketMechanic } from './entities/ticket-mechanic.entity';
import { TicketPart } from './entities/ticket-part.entity';
import {
  NoValidTargetException,
  NotAssociatedException,
} from './exceptions/relationship.exceptions';
import { TICKET_RELATIONS } from './ticket-relations';

export interface AddPartsResult {
  /** Parts that resolved, including ones that were already linked. */
  added: number;
  ticket: ServiceTicket;
}

/**
 * Maintains the ticket ↔ mechanic and ticket ↔ part sets.
 *
 * Every operation runs in one transaction. Links are inserted with
 * "insert or ignore" against the pair's primary key, so two concurrent
 * assigns of the same pair leave exactly one row and neither fails.
 */
@Injectable()
export class TicketAssignmentsService {
  private readonly logger = new Logger(TicketAssignmentsService.name);

  constructor(private readonly dataSource: DataSource) {}

  assignMechanic(ticketId: number, mechanicId: number): Promise<ServiceTicket> {
    return this.dataSource.transaction(async (manager) => {
      await this.assertTicketExists(manager, ticketId);
      await this.assertMechanicExists(manager, mechanicId);

      await this.linkMechanics(manager, ticketId, [mechanicId]);
      this.logger.log(`Mechanic ${mechanicId} assigned to ticket ${ticketId}`);

      return this.loadTicket(manager, ticketId);
    });
  }

  /** Removing a mechanic who is not assigned is a no-op. */
  removeMechanic(ticketId: number, mechanicId: number): Promise<ServiceTicket> {
    return this.dataSource.transaction(async (manager) => {
      await this.assertTicketExists(manager, ticketId);
      await this.assertMechanicExists(manager, mechanicId);

      await manager.delete(TicketMechanic, { ticketId, mechanicId });
      this.logger.log(`Mechanic ${mechanicId} removed from ticket ${ticketId}`);

      return this.loadTicket(manager, ticketId);
    });
  }

  /**
   * Applies the description, then the additions, then the removals. Ids that
   * match no mechanic are skipped; the remainder of the batch still applies.
   */
  bulkEdit(ticketId: number, dto: EditServiceTicketDto): Promise<ServiceTicket> {
    return this.dataSource.transaction(async (manager) => {
      await this.assertTicketExists(manager, ticketId);

      if (dto.description !== undefined) {
        await manager.update(
          ServiceTicket,
          { id: ticketId },
          { description: dto.description },
        );
      }

      const addIds = [...new Set(dto.add_ids ?? [])];
      if (addIds.length > 0) {
        const mechanics = await manager.find(Mechanic, {
          where: { id: In(addIds) },
          select: { id: true },
        });
        await this.linkMechanics(
          manager,
          ticketId,
          mechanics.map((mechanic) => mechanic.id),
        );
      }

      const removeIds = [...new Set(dto.remove_ids ?? [])];
      if (removeIds.length > 0) {
        await manager.delete(TicketMechanic, {
          ticketId,
          mechanicId: In(removeIds),
        });
      }

      this.logger.log(
        `Ticket ${ticketId} edited (+${addIds.length}/-${removeIds.length} requested)`,
      );
      return this.loadTicket(manager, ticketId);
    });
  }

  /**
   * Links the parts that exist. Fails with NoValidTargetException when none
   * of the ids resolve, an empty list included. `added` counts every part
   * that resolved, so re-adding a linked part still counts it.
   */
  addParts(ticketId: number, partIds: number[]): Promise<AddPartsResult> {
    return this.dataSource.transaction(async (manager) => {
      await this.assertTicketExists(manager, ticketId);

      const uniqueIds = [...new Set(partIds)];
      const parts =
        uniqueIds.length === 0
          ? []
          : await manager.find(Part, {
              where: { id: In(uniqueIds) },
              select: { id: true },
            });
      if (parts.length === 0) {
        throw new NoValidTargetException('No valid parts found for given IDs');
      }

      const resolvedIds = parts.map((part) => part.id);
      const existing = await manager.find(TicketPart, {
        where: { ticketId, partId: In(resolvedIds) },
      });
      const linked = new Set(existing.map((link) => link.partId));
      const toAdd = resolvedIds.filter((id) => !linked.has(id));

      if (toAdd.length > 0) {
        await manager
          .createQueryBuilder()
          .insert()
          .into(TicketPart)
          .values(toAdd.map((partId) => ({ ticketId, partId })))
          .orIgnore()
          .execute();
      }
      this.logger.log(
        `Added ${resolvedIds.length} parts to ticket ${ticketId} (${toAdd.length} new)`,
      );

      return { added: resolvedIds.length, ticket: await this.loadTicket(manager, ticketId) };
    });
  }

  removePart(ticketId: number, partId: number): Promise<void> {
    return this.dataSource.transaction(async (manager) => {
      await this.assertTicketExists(manager, ticketId);
      if (!(await manager.existsBy(Part, { id: partId }))) {
        throw new NotFoundException(`Part with id ${partId} not found.`);
      }

      if (!(await manager.existsBy(TicketPart, { ticketId, partId }))) {
        throw new NotAssociatedException(
          'Part not associated with this service ticket',
        );
      }

      await manager.delete(TicketPart, { ticketId, partId });
      this.logger.log(`Part ${partId} removed from ticket ${ticketId}`);
    });
  }

  private async linkMechanics(
    manager: EntityManager,
    ticketId: number,
    mechanicIds: number[],
  ): Promise<void> {
    if (mechanicIds.length === 0) return;

    await manager
      .createQueryBuilder()
      .insert()
      .into(TicketMechanic)
      .values(mechanicIds.map((mechanicId) => ({ ticketId, mechanicId })))
      .orIgnore()
      .execute();
  }

  private async assertTicketExists(
    manager: EntityManager,
    ticketId: number,
  ): Promise<void> {
    if (!(await manager.existsBy(ServiceTicket, { id: ticketId }))) {
      throw new NotFoundException(
        `Service ticket with id ${ticketId} not found.`,
      );
    }
  }

  private async assertMechanicExists(
    manager: EntityManager,
    mechanicId: number,
  ): Promise<void> {
    if (!(await manager.existsBy(Mechanic, { id: mechanicId }))) {
      throw new NotFoundException(`Mechanic with id ${mechanicId} not found.`);
    }
  }

  private async loadTicket(
    manager: EntityManager,
    ticketId: number,
  ): Promise<ServiceTicket> {
    const ticket = await manager.findOne(ServiceTicket, {
      where: { id: ticketId },
      relations: TICKET_RELATIONS,
    });
    if (!ticket) {
      throw new NotFoundException(
        `Service ticket with id ${ticketId} not found.`,
      );
    }
    return ticket;
  }
}
