import { MaintenanceFiles } from '../content/content.source';
import { MaintenanceResolvedOptions } from '../module/options';
import { RequestContext, resolveClientAddress } from '../utils/ip';
import { LoggerPort } from '../utils/logger.interface';
import { isIgnored } from './allow-list.matcher';
import { isDenied } from './deny-uri.matcher';
import { isActive } from './trigger.evaluator';

/** Per-request outcome; computed fresh for every request and never cached. */
export interface MaintenanceDecision {
  /** Maintenance mode is on (switch enabled and trigger present, if configured). */
  active: boolean;
  /** Resolved client address; only computed while active. */
  address?: string;
  /** Caller is not covered by the allow-list. */
  ignored: boolean;
  /** URI matched a deny pattern. */
  denied: boolean;
  /** `ignored || denied` while active. */
  showPage: boolean;
}

const INACTIVE: Readonly<MaintenanceDecision> = Object.freeze({
  active: false,
  ignored: false,
  denied: false,
  showPage: false,
});

export class DecisionEngine {
  constructor(
    private readonly options: MaintenanceResolvedOptions,
    private readonly files: MaintenanceFiles,
    private readonly logger: LoggerPort,
  ) {}

  async decide(ctx: RequestContext): Promise<MaintenanceDecision> {
    const active = await isActive(this.options.enabled, this.options.triggerFilename, this.files);
    if (!active) {
      return { ...INACTIVE };
    }

    const address = resolveClientAddress(ctx);
    const ignored = isIgnored(this.options.ipAllowList, address, this.logger);
    // A deny-uri match overrides the allow-list exemption.
    const denied = isDenied(this.options.denyUri, ctx.uri, {
      logger: this.logger,
      trace: this.options.logDenyUriChecks,
    });

    return {
      active,
      address,
      ignored,
      denied,
      showPage: ignored || denied,
    };
  }
}
