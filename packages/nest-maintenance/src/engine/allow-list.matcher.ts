import { MalformedRangeError } from '../utils/errors';
import { CidrRange, cidrContains, parseCidr } from '../utils/ip';
import { LoggerPort } from '../utils/logger.interface';
import { silentLogger } from '../utils/logger';

/**
 * Returns `true` when the caller must see the maintenance page (not allow-listed).
 *
 * An empty allow-list exempts nobody. Malformed entries are logged and skipped;
 * the first range containing `address` short-circuits to `false`.
 */
export function isIgnored(allowList: readonly string[], address: string, logger: LoggerPort = silentLogger): boolean {
  if (allowList.length === 0) {
    return true;
  }

  for (const entry of allowList) {
    const range = tryParseRange(entry, logger);
    if (!range) {
      continue;
    }

    if (cidrContains(range, address)) {
      return false;
    }
  }

  return true;
}

function tryParseRange(entry: string, logger: LoggerPort): CidrRange | null {
  try {
    return parseCidr(entry);
  } catch (error) {
    if (error instanceof MalformedRangeError) {
      logger.warn('Skipping allow-list entry', { range: entry, error: error.message });
      return null;
    }
    throw error;
  }
}
