import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccountsModule } from '../accounts/accounts.module';
import { AuthModule } from '../auth/auth.module';
import { ServiceTicket } from './entities/service-ticket.entity';
import { TicketMechanic } from './entities/ticket-mechanic.entity';
import { TicketPart } from './entities/ticket-part.entity';
import { ServiceTicketsController } from './service-tickets.controller';
import { ServiceTicketsService } from './service-tickets.service';
import { TicketAssignmentsService } from './ticket-assignments.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([ServiceTicket, TicketMechanic, TicketPart]),
    AccountsModule,
    AuthModule,
  ],
  controllers: [ServiceTicketsController],
  providers: [ServiceTicketsService, TicketAssignmentsService],
  exports: [ServiceTicketsService],
})
export class ServiceTicketsModule {}
