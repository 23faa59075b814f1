import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { AccountsModule } from '../accounts/accounts.module';
import { getNumber, getRequired } from '../config/env';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { RoleResolverService } from './role-resolver.service';
import { TokenService } from './token.service';

export const DEFAULT_TOKEN_TTL_SECONDS = 3600;

@Module({
  imports: [
    AccountsModule,
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        secret: getRequired(config, 'JWT_SECRET'),
        signOptions: {
          expiresIn: getNumber(
            config,
            'JWT_EXPIRATION',
            DEFAULT_TOKEN_TTL_SECONDS,
          ),
        },
      }),
    }),
  ],
  providers: [TokenService, RoleResolverService, JwtAuthGuard, RolesGuard],
  exports: [TokenService, RoleResolverService, JwtAuthGuard, RolesGuard],
})
export class AuthModule {}
