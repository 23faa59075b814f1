import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { Account } from '../src/accounts/entities/account.entity';
import { Customer } from '../src/customers/entities/customer.entity';
import { Part } from '../src/inventory/entities/part.entity';
import { Mechanic } from '../src/mechanics/entities/mechanic.entity';
import { ServiceTicket } from '../src/service-tickets/entities/service-ticket.entity';
import { TicketMechanic } from '../src/service-tickets/entities/ticket-mechanic.entity';
import { TicketPart } from '../src/service-tickets/entities/ticket-part.entity';
import { TicketAssignmentsService } from '../src/service-tickets/ticket-assignments.service';

describe('TicketAssignmentsService (sqlite)', () => {
  let moduleRef: TestingModule;
  let service: TicketAssignmentsService;
  let dataSource: DataSource;
  let ticket: ServiceTicket;
  let mechanics: Mechanic[];
  let part: Part;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [
            Account,
            Customer,
            Mechanic,
            Part,
            ServiceTicket,
            TicketMechanic,
            TicketPart,
          ],
          synchronize: true,
        }),
      ],
      providers: [TicketAssignmentsService],
    }).compile();

    service = moduleRef.get(TicketAssignmentsService);
    dataSource = moduleRef.get(DataSource);

    const customer = await dataSource.getRepository(Customer).save({
      name: 'Ada',
      email: 'ada@example.com',
      password: 'hash',
      address: '1 Main St',
      phone: '555-0100',
    });
    mechanics = await dataSource.getRepository(Mechanic).save([
      {
        name: 'Max',
        email: 'max@example.com',
        password: 'hash',
        address: '2 Side St',
        phone: '555-0200',
        specialty: 'Engines',
        salary: 50000,
      },
      {
        name: 'Kim',
        email: 'kim@example.com',
        password: 'hash',
        address: '3 Side St',
        phone: '555-0300',
        specialty: null,
        salary: null,
      },
    ]);
    part = await dataSource.getRepository(Part).save({
      name: 'Brake pad',
      sku: 'BP-1',
      description: null,
      price: 30,
    });
    ticket = await dataSource.getRepository(ServiceTicket).save({
      description: 'Brakes squeal',
      vin: 'TESTVIN0000000001',
      customerId: customer.id,
    });
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.getRepository(TicketMechanic).clear();
    await dataSource.getRepository(TicketPart).clear();
  });

  const linkedMechanicIds = async () =>
    (
      await dataSource
        .getRepository(TicketMechanic)
        .find({ where: { ticketId: ticket.id }, order: { mechanicId: 'ASC' } })
    ).map((link) => link.mechanicId);

  it('gives customer and mechanic ids from one sequence', () => {
    expect(new Set([...mechanics.map((m) => m.id), ticket.customerId]).size).toBe(3);
  });

  it('stores one row when a pair is assigned twice', async () => {
    await service.assignMechanic(ticket.id, mechanics[0].id);
    const result = await service.assignMechanic(ticket.id, mechanics[0].id);

    expect(result.mechanicLinks.map((link) => link.mechanic.id)).toEqual([
      mechanics[0].id,
    ]);
    expect(await linkedMechanicIds()).toEqual([mechanics[0].id]);
  });

  it('ignores a pair that is already stored', async () => {
    await dataSource
      .getRepository(TicketMechanic)
      .insert({ ticketId: ticket.id, mechanicId: mechanics[1].id });

    await service.assignMechanic(ticket.id, mechanics[1].id);

    expect(await linkedMechanicIds()).toEqual([mechanics[1].id]);
  });

  it('adds before it removes in a bulk edit', async () => {
    await service.bulkEdit(ticket.id, {
      add_ids: [mechanics[0].id, mechanics[1].id],
      remove_ids: [mechanics[1].id],
    });

    expect(await linkedMechanicIds()).toEqual([mechanics[0].id]);
  });

  it('rolls the whole bulk edit back when a step fails', async () => {
    jest
      .spyOn(EntityManager.prototype, 'delete')
      .mockRejectedValueOnce(new Error('disk I/O error'));

    await expect(
      service.bulkEdit(ticket.id, {
        description: 'Changed',
        add_ids: [mechanics[0].id],
        remove_ids: [mechanics[1].id],
      }),
    ).rejects.toThrow('disk I/O error');

    expect(await linkedMechanicIds()).toEqual([]);
    const reloaded = await dataSource
      .getRepository(ServiceTicket)
      .findOneByOrFail({ id: ticket.id });
    expect(reloaded.description).toBe('Brakes squeal');
  });

  it('rejects an unknown ticket before touching the links', async () => {
    await expect(service.assignMechanic(9999, mechanics[0].id)).rejects.toThrow(
      'Service ticket with id 9999 not found.',
    );
  });

  it('counts every resolved part and never links one twice', async () => {
    const first = await service.addParts(ticket.id, [part.id, 9999]);
    const second = await service.addParts(ticket.id, [part.id, part.id]);

    expect(first.added).toBe(1);
    expect(second.added).toBe(1);
    expect(second.ticket.partLinks.map((link) => link.part.sku)).toEqual(['BP-1']);
  });

  it('rejects an empty part list as having no valid target', async () => {
    await expect(service.addParts(ticket.id, [])).rejects.toThrow(
      'No valid parts found for given IDs',
    );
  });

  it('reports a part that exists but is not linked', async () => {
    await expect(service.removePart(ticket.id, part.id)).rejects.toThrow(
      'Part not associated with this service ticket',
    );
  });

  it('reports a part that does not exist', async () => {
    await expect(service.removePart(ticket.id, 9999)).rejects.toThrow(
      'Part with id 9999 not found.',
    );
  });
});
