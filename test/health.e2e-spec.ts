import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckError, TypeOrmHealthIndicator } from '@nestjs/terminus';
import request from 'supertest';
import { HealthModule } from '../src/health/health.module';
import { createTestApp } from './utils/test-app';

describe('Health (e2e)', () => {
  describe('GET /health', () => {
    it('reports the database up outside the /api prefix', async () => {
      const app = await createTestApp();

      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body.status).toBe('ok');
      expect(res.body.info.database.status).toBe('up');

      await app.close();
    });

    it('when DB is down returns 503', async () => {
      const moduleFixture: TestingModule = await Test.createTestingModule({
        imports: [ConfigModule.forRoot({ isGlobal: true }), HealthModule],
      })
        .overrideProvider(TypeOrmHealthIndicator)
        .useValue({
          pingCheck: () =>
            Promise.reject(
              new HealthCheckError('Database check failed', {
                database: { status: 'down', message: 'Connection refused' },
              }),
            ),
        })
        .compile();

      const app: INestApplication = moduleFixture.createNestApplication();
      await app.init();

      await request(app.getHttpServer()).get('/health').expect(503);

      await app.close();
    });
  });
});
