import { Injectable, NestMiddleware, Optional } from '@nestjs/common';
import { MaintenanceOutcome, MaintenanceRuntime } from '../module/runtime';
import { getMaintenanceRuntime } from '../module/runtime.registry';
import { RequestLike } from '../utils/ip';
import { ResponseLike } from './response';

export type NextFunction = (err?: unknown) => void;
export type MaintenanceRequestHandler = (req: RequestLike, res: ResponseLike, next: NextFunction) => Promise<void>;

/**
 * Creates HTTP middleware that answers with the maintenance page or calls `next()`.
 * Without an explicit runtime the one registered by `MaintenanceModule` is used; with none, requests pass through.
 */
export function createMaintenanceMiddleware(runtime?: MaintenanceRuntime): MaintenanceRequestHandler {
  return async (req, res, next) => {
    const current = runtime ?? getMaintenanceRuntime();
    if (!current) {
      next();
      return;
    }

    let outcome: MaintenanceOutcome;
    try {
      outcome = await current.handle(req, res);
    } catch (error) {
      next(error);
      return;
    }

    if (outcome === 'forwarded') {
      next();
    }
  };
}

@Injectable()
/** Class form for `consumer.apply(MaintenanceMiddleware).forRoutes('*')`. */
export class MaintenanceMiddleware implements NestMiddleware<RequestLike, ResponseLike> {
  private readonly handler: MaintenanceRequestHandler;

  constructor(@Optional() runtime?: MaintenanceRuntime) {
    this.handler = createMaintenanceMiddleware(runtime);
  }

  use(req: RequestLike, res: ResponseLike, next: NextFunction): Promise<void> {
    return this.handler(req, res, next);
  }
}
