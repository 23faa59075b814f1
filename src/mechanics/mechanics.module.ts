import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { AuthModule } from '../auth/auth.module';
import { MechanicsController } from './mechanics.controller';
import { MechanicsService } from './mechanics.service';

@Module({
  imports: [AccountsModule, AuthModule],
  controllers: [MechanicsController],
  providers: [MechanicsService],
})
export class MechanicsModule {}
