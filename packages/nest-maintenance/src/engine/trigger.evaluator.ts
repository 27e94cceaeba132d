import { MaintenanceFiles } from '../content/content.source';

/**
 * Resolves whether maintenance mode applies right now.
 * `enabled` is the master switch; a configured trigger file must also exist. Probe errors read as inactive.
 */
export async function isActive(
  enabled: boolean,
  triggerFilename: string | undefined,
  files: MaintenanceFiles,
): Promise<boolean> {
  if (!enabled) {
    return false;
  }

  if (!triggerFilename) {
    return true;
  }

  try {
    return await files.exists(triggerFilename);
  } catch {
    return false;
  }
}
