import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { RoleDeniedException } from '../auth/exceptions';
import { Role } from '../common/decorators/roles.decorator';
import { DuplicateConstraintException } from '../common/exceptions/duplicate-constraint.exception';
import type { Principal } from '../common/interfaces/authenticated-request.interface';
import { Customer } from '../customers/entities/customer.entity';
import { ServiceTicket } from './entities/service-ticket.entity';
import { TicketAccessDeniedException } from './exceptions/ticket-access-denied.exception';
import { ServiceTicketsService } from './service-tickets.service';
import { TICKET_RELATIONS } from './ticket-relations';

const mechanic = { kind: Role.MECHANIC, id: 1 } as Principal;
const owner = { kind: Role.CUSTOMER, id: 10 } as Principal;
const stranger = { kind: Role.CUSTOMER, id: 11 } as Principal;

describe('ServiceTicketsService', () => {
  let service: ServiceTicketsService;

  const ticketRepo = {
    create: jest.fn((x: object) => x),
    save: jest.fn(async (x: object) => ({ id: 100, ...x })),
    existsBy: jest.fn(),
    findOne: jest.fn(),
    findAndCount: jest.fn(),
    update: jest.fn(),
  };
  const customerRepo = { existsBy: jest.fn() };

  const ticket = {
    id: 100,
    description: 'Brakes squeal',
    vin: '1HGCM82633A004352',
    customerId: 10,
    mechanicLinks: [],
    partLinks: [
      { partId: 4, part: { id: 4, name: 'Pad' } },
      { partId: 2, part: { id: 2, name: 'Rotor' } },
    ],
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ServiceTicketsService,
        { provide: getRepositoryToken(ServiceTicket), useValue: ticketRepo },
        { provide: getRepositoryToken(Customer), useValue: customerRepo },
        { provide: DataSource, useValue: { transaction: jest.fn() } },
      ],
    }).compile();

    service = moduleRef.get(ServiceTicketsService);
  });

  describe('create', () => {
    const dto = {
      description: 'Brakes squeal',
      vin: '1HGCM82633A004352',
      customer_id: 10,
    };

    it('rejects a VIN that is already on file before inserting', async () => {
      ticketRepo.existsBy.mockResolvedValue(true);

      await expect(service.create(dto)).rejects.toThrow(
        new DuplicateConstraintException(
          'A service ticket with this VIN already exists.',
        ),
      );
      expect(ticketRepo.save).not.toHaveBeenCalled();
    });

    it('requires the customer to exist', async () => {
      ticketRepo.existsBy.mockResolvedValue(false);
      customerRepo.existsBy.mockResolvedValue(false);

      await expect(service.create(dto)).rejects.toThrow(
        new NotFoundException('Customer with id 10 not found.'),
      );
    });

    it('saves and reloads the ticket', async () => {
      ticketRepo.existsBy.mockResolvedValue(false);
      customerRepo.existsBy.mockResolvedValue(true);
      ticketRepo.findOne.mockResolvedValue(ticket);

      await expect(service.create(dto)).resolves.toBe(ticket);
      expect(ticketRepo.save).toHaveBeenCalledWith({
        description: 'Brakes squeal',
        vin: '1HGCM82633A004352',
        customerId: 10,
      });
      expect(ticketRepo.findOne).toHaveBeenCalledWith({
        where: { id: 100 },
        relations: TICKET_RELATIONS,
      });
    });
  });

  describe('findAll', () => {
    beforeEach(() => ticketRepo.findAndCount.mockResolvedValue([[], 0]));

    it('lists every ticket for a mechanic', async () => {
      await service.findAll(mechanic, { page: 1, perPage: 10 });

      expect(ticketRepo.findAndCount).toHaveBeenCalledWith(
        expect.objectContaining({ where: {}, skip: 0, take: 10 }),
      );
    });

    it('scopes a customer to their own tickets', async () => {
      await service.findAll(owner, { page: 3, perPage: 5 });

      expect(ticketRepo.findAndCount).toHaveBeenCalledWith(
        expect.objectContaining({ where: { customerId: 10 }, skip: 10, take: 5 }),
      );
    });

    it('denies a principal with no role', async () => {
      await expect(
        service.findAll({ kind: 'unauthenticated', id: 5 }, { page: 1, perPage: 10 }),
      ).rejects.toThrow(RoleDeniedException);
    });
  });

  describe('findOne', () => {
    beforeEach(() => ticketRepo.findOne.mockResolvedValue(ticket));

    it('lets any mechanic read', async () => {
      await expect(service.findOne(100, mechanic)).resolves.toBe(ticket);
    });

    it('lets the owning customer read', async () => {
      await expect(service.findOne(100, owner)).resolves.toBe(ticket);
    });

    it('denies another customer', async () => {
      await expect(service.findOne(100, stranger)).rejects.toThrow(
        TicketAccessDeniedException,
      );
    });

    it('reports a missing ticket as not found', async () => {
      ticketRepo.findOne.mockResolvedValue(null);

      await expect(service.findOne(7, mechanic)).rejects.toThrow(
        'Service ticket with id 7 not found.',
      );
    });
  });

  it('returns the parts of a readable ticket in id order', async () => {
    ticketRepo.findOne.mockResolvedValue(ticket);

    const parts = await service.getParts(100, owner);

    expect(parts.map((part) => part.id)).toEqual([2, 4]);
  });

  it('updates only the description', async () => {
    ticketRepo.findOne.mockResolvedValue({ ...ticket });

    const updated = await service.update(100, { description: 'Fixed' });

    expect(ticketRepo.update).toHaveBeenCalledWith(
      { id: 100 },
      { description: 'Fixed' },
    );
    expect(updated.description).toBe('Fixed');
    expect(updated.vin).toBe('1HGCM82633A004352');
  });
});
