import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { getNumber } from './env';

export function buildTypeOrmOptions(
  config: ConfigService,
): TypeOrmModuleOptions {
  const driver = config.get<string>('DB_TYPE', 'postgres');
  const nodeEnv = config.get<string>('NODE_ENV');
  const synchronize = nodeEnv !== 'production';

  if (driver === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: config.get<string>('DB_NAME', ':memory:'),
      autoLoadEntities: true,
      synchronize,
    };
  }

  if (driver !== 'postgres') {
    throw new Error(`Unsupported DB_TYPE "${driver}".`);
  }

  return {
    type: 'postgres',
    host: config.get<string>('DB_HOST', 'localhost'),
    port: getNumber(config, 'DB_PORT', 5432),
    username: config.get<string>('DB_USERNAME'),
    password: config.get<string>('DB_PASSWORD'),
    database: config.get<string>('DB_NAME'),
    autoLoadEntities: true,
    synchronize,
    logging: nodeEnv === 'development',
  };
}
