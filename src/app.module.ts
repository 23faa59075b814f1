import { CacheModule } from '@nestjs/cache-manager';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccountsModule } from './accounts/accounts.module';
import { AuthModule } from './auth/auth.module';
import {
  CREATE_THROTTLER,
  READ_THROTTLER,
} from './common/decorators/rate-tier.decorator';
import { buildTypeOrmOptions } from './config/database.config';
import { getNumber } from './config/env';
import { CustomersModule } from './customers/customers.module';
import { HealthModule } from './health/health.module';
import { InventoryModule } from './inventory/inventory.module';
import { MechanicsModule } from './mechanics/mechanics.module';
import { ServiceTicketsModule } from './service-tickets/service-tickets.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: buildTypeOrmOptions,
    }),
    CacheModule.registerAsync({
      isGlobal: true,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        ttl: getNumber(config, 'CACHE_TTL_MS', 30_000),
      }),
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [
        {
          name: CREATE_THROTTLER,
          limit: getNumber(config, 'THROTTLE_CREATE_LIMIT', 10),
          ttl: getNumber(config, 'THROTTLE_CREATE_TTL_MS', 60_000),
        },
        {
          name: READ_THROTTLER,
          limit: getNumber(config, 'THROTTLE_READ_LIMIT', 60),
          ttl: getNumber(config, 'THROTTLE_READ_TTL_MS', 3_600_000),
        },
      ],
    }),
    AccountsModule,
    AuthModule,
    CustomersModule,
    MechanicsModule,
    InventoryModule,
    ServiceTicketsModule,
    HealthModule,
  ],
})
export class AppModule {}
