import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;
  let pingCheck: jest.Mock;

  beforeEach(async () => {
    pingCheck = jest.fn().mockResolvedValue({ database: { status: 'up' } });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        HealthCheckService,
        { provide: TypeOrmHealthIndicator, useValue: { pingCheck } },
      ],
    })
      .overrideProvider(HealthCheckService)
      .useValue({
        check: jest.fn((checks: (() => Promise<unknown>)[]) =>
          Promise.all(checks.map((c) => c())).then((results) => ({
            status: 'ok',
            info: Object.assign({}, ...results),
            error: {},
            details: Object.assign({}, ...results),
          })),
        ),
      })
      .compile();

    controller = module.get<HealthController>(HealthController);
  });

  it('pings the database with a 3 second timeout', async () => {
    await controller.check();
    expect(pingCheck).toHaveBeenCalledWith('database', { timeout: 3000 });
  });

  it('reports the database as up when the ping succeeds', async () => {
    const result = await controller.check();
    expect(result.status).toBe('ok');
    expect(result.info?.database?.status).toBe('up');
  });
});
