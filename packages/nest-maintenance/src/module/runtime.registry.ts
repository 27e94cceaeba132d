import { MaintenanceRuntime } from './runtime';

let runtime: MaintenanceRuntime | null = null;

/**
 * Registers the runtime used by `createMaintenanceMiddleware()` and returns the one it replaces.
 * The last initialised `MaintenanceModule` wins.
 */
export function setMaintenanceRuntime(next: MaintenanceRuntime): MaintenanceRuntime | null {
  const previous = runtime;
  runtime = next;
  return previous;
}

export function getMaintenanceRuntime(): MaintenanceRuntime | null {
  return runtime;
}

/**
 * Clears the registration. With `owner`, only that runtime is removed, so a module shutting down
 * does not unregister a runtime another module has registered since.
 */
export function clearMaintenanceRuntime(owner?: MaintenanceRuntime): boolean {
  if (owner && runtime !== owner) {
    return false;
  }
  runtime = null;
  return true;
}
