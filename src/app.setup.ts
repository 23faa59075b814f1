import { INestApplication, ValidationPipe } from '@nestjs/common';
import { QueryFailedFilter } from './common/filters/query-failed.filter';

/** Global prefix, validation and storage-error mapping, shared with the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix('api', { exclude: ['health'] });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new QueryFailedFilter());

  return app;
}
