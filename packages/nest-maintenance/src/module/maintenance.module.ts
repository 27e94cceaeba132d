import { DynamicModule, Global, Module, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { MaintenanceMiddleware } from '../http/maintenance.middleware';
import { MAINTENANCE_OPTIONS } from './maintenance.tokens';
import { MaintenanceModuleOptions } from './options';
import { clearMaintenanceRuntime, setMaintenanceRuntime } from './runtime.registry';
import { MaintenanceRuntime } from './runtime';

@Global()
@Module({})
/** Global Nest module that creates and registers a shared `MaintenanceRuntime`. */
export class MaintenanceModule implements OnModuleInit, OnModuleDestroy {
  constructor(private readonly runtime: MaintenanceRuntime) {}

  /** Creates a globally-available maintenance module; invalid options fail application bootstrap. */
  static forRoot(options: MaintenanceModuleOptions = {}): DynamicModule {
    return {
      module: MaintenanceModule,
      providers: [
        {
          provide: MAINTENANCE_OPTIONS,
          useValue: options,
        },
        {
          provide: MaintenanceRuntime,
          useFactory: (input: MaintenanceModuleOptions) => new MaintenanceRuntime(input),
          inject: [MAINTENANCE_OPTIONS],
        },
        MaintenanceMiddleware,
      ],
      exports: [MaintenanceRuntime, MaintenanceMiddleware],
      global: true,
    };
  }

  /** Exposes the runtime through the registry for `createMaintenanceMiddleware()`. */
  onModuleInit(): void {
    setMaintenanceRuntime(this.runtime);
  }

  onModuleDestroy(): void {
    clearMaintenanceRuntime(this.runtime);
  }
}
