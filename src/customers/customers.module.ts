import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { AuthModule } from '../auth/auth.module';
import { ServiceTicketsModule } from '../service-tickets/service-tickets.module';
import { CustomersController } from './customers.controller';
import { CustomersService } from './customers.service';

@Module({
  imports: [AccountsModule, AuthModule, ServiceTicketsModule],
  controllers: [CustomersController],
  providers: [CustomersService],
})
export class CustomersModule {}
