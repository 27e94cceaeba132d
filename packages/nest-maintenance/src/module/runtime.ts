import { renderMaintenanceContent } from '../content/content.renderer';
import { MaintenanceFiles, NodeMaintenanceFiles } from '../content/content.source';
import { DecisionEngine, MaintenanceDecision } from '../engine/decision.engine';
import { setMaintenanceContext } from '../http/context';
import { ResponseLike, writeMaintenanceResponse } from '../http/response';
import { ContentReadError, MaintenanceError, ResponseWriteError } from '../utils/errors';
import { extractUri, RequestLike, toRequestContext } from '../utils/ip';
import { MaintenanceLogger } from '../utils/logger';
import { LoggerPort } from '../utils/logger.interface';
import { MaintenanceModuleOptions, MaintenanceResolvedOptions, resolveMaintenanceOptions } from './options';

/** What the runtime did with a request: answered it, or left it to the next handler. */
export type MaintenanceOutcome = 'served' | 'forwarded';

/** Maintenance gate: decides per request and serves the static page when it applies. */
export class MaintenanceRuntime {
  private readonly options: MaintenanceResolvedOptions;
  private readonly logger: LoggerPort;
  private readonly files: MaintenanceFiles;
  private readonly engine: DecisionEngine;

  /** Resolves options; throws `MaintenanceConfigError` on invalid configuration. */
  constructor(input: MaintenanceModuleOptions = {}) {
    this.options = resolveMaintenanceOptions(input);
    this.logger = this.options.logger ?? new MaintenanceLogger('nest-maintenance', this.options.logLevel);
    this.files = this.options.files ?? new NodeMaintenanceFiles();
    this.engine = new DecisionEngine(this.options, this.files, this.logger);
  }

  /** Returns normalized runtime options (useful for diagnostics and tests). */
  getOptions(): MaintenanceResolvedOptions {
    return this.options;
  }

  /** Computes the decision for a request and attaches it to the request. */
  async decide(req: RequestLike): Promise<MaintenanceDecision> {
    const decision = await this.engine.decide(toRequestContext(req));
    setMaintenanceContext(req, decision);
    return decision;
  }

  /**
   * Serves the maintenance page when the decision calls for it.
   * Read or write failures are logged and reported as `forwarded` so the service stays reachable.
   */
  async handle(req: RequestLike, res: ResponseLike): Promise<MaintenanceOutcome> {
    const decision = await this.decide(req);
    if (!decision.showPage) {
      return 'forwarded';
    }

    const { filename, httpResponseCode, httpContentType } = this.options;

    let body: Buffer;
    try {
      body = renderMaintenanceContent(await this.files.read(filename), this.options.variables);
    } catch (error) {
      this.logFailure(new ContentReadError(filename, error), req, decision);
      return 'forwarded';
    }

    try {
      writeMaintenanceResponse(res, httpResponseCode, httpContentType, body);
    } catch (error) {
      this.logFailure(new ResponseWriteError(filename, error), req, decision);
      return 'forwarded';
    }

    this.logEvent('maintenance-served', req, decision, { status: httpResponseCode });
    return 'served';
  }

  private logFailure(error: MaintenanceError, req: RequestLike, decision: MaintenanceDecision): void {
    this.logger.error(error.message, {
      event: 'maintenance-fallthrough',
      uri: extractUri(req),
      ip: decision.address,
    });
  }

  private logEvent(
    event: string,
    req: RequestLike,
    decision: MaintenanceDecision,
    meta?: Record<string, unknown>,
  ): void {
    if (!this.options.logging) {
      return;
    }

    const payload: Record<string, unknown> = {
      event,
      uri: extractUri(req),
      ip: decision.address,
      ignored: decision.ignored,
      denied: decision.denied,
    };

    if (meta) {
      Object.assign(payload, meta);
    }

    this.logger.debug('Maintenance', payload);
  }
}
