/** Injection token carrying the raw `MaintenanceModuleOptions`. */
export const MAINTENANCE_OPTIONS = Symbol('MAINTENANCE_OPTIONS');
