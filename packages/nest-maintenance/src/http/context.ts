import { MaintenanceDecision } from '../engine/decision.engine';

const decisions = new WeakMap<object, MaintenanceDecision>();

/** Attaches the maintenance decision to the request for downstream handlers. */
export function setMaintenanceContext(req: object, decision: MaintenanceDecision): void {
  decisions.set(req, decision);
}

/** Returns the decision taken for this request, if the middleware ran. */
export function getMaintenanceContext(req: object): MaintenanceDecision | undefined {
  return decisions.get(req);
}
