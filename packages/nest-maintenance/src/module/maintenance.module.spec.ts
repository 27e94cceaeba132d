import { Test } from '@nestjs/testing';
import { fakeRequest, FakeResponse, RecordingLogger } from '../__fixtures__/http.fixture';
import { MemoryMaintenanceFiles } from '../content/content.source';
import { MaintenanceMiddleware } from '../http/maintenance.middleware';
import { MaintenanceModule } from './maintenance.module';
import { MaintenanceRuntime } from './runtime';
import { getMaintenanceRuntime } from './runtime.registry';

describe('MaintenanceModule', () => {
  it('provides the runtime and registers it for the lifetime of the module', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        MaintenanceModule.forRoot({
          enabled: true,
          filename: 'maintenance.html',
          ipAllowList: ['10.0.0.0/8'],
          files: new MemoryMaintenanceFiles({ 'maintenance.html': 'maintenance' }),
          logger: new RecordingLogger(),
        }),
      ],
    }).compile();
    await moduleRef.init();

    const runtime = moduleRef.get(MaintenanceRuntime);
    expect(runtime.getOptions().ipAllowList).toEqual(['10.0.0.0/8']);
    expect(getMaintenanceRuntime()).toBe(runtime);

    await moduleRef.close();
    expect(getMaintenanceRuntime()).toBeNull();
  });

  it('injects the runtime into the middleware class', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        MaintenanceModule.forRoot({
          enabled: true,
          filename: 'maintenance.html',
          files: new MemoryMaintenanceFiles({ 'maintenance.html': 'maintenance' }),
          logger: new RecordingLogger(),
        }),
      ],
    }).compile();

    const middleware = moduleRef.get(MaintenanceMiddleware);
    const next = jest.fn();
    const res = new FakeResponse();
    await middleware.use(fakeRequest({ remoteAddress: '198.51.100.7' }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(503);
    await moduleRef.close();
  });

  it('fails compilation on invalid options', async () => {
    await expect(
      Test.createTestingModule({ imports: [MaintenanceModule.forRoot({ enabled: true })] }).compile(),
    ).rejects.toThrow('[nest-maintenance] filename cannot be empty');
  });
});
