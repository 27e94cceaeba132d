import { MalformedPatternError } from '../utils/errors';
import { LoggerPort } from '../utils/logger.interface';
import { silentLogger } from '../utils/logger';

export interface DenyUriOptions {
  logger?: LoggerPort;
  /** Emits a debug line for every pattern evaluated. */
  trace?: boolean;
}

/** Compiles a deny-uri entry as a case-sensitive, unanchored regular expression. */
export function compileDenyPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new MalformedPatternError(pattern, error);
  }
}

/** Returns `true` when any pattern matches somewhere in `uri`. Patterns that fail to compile never match. */
export function isDenied(denyList: readonly string[], uri: string, options: DenyUriOptions = {}): boolean {
  if (denyList.length === 0) {
    return false;
  }

  const logger = options.logger ?? silentLogger;
  for (const pattern of denyList) {
    if (options.trace) {
      logger.debug('Evaluating deny-uri pattern', { uri, pattern });
    }

    let regex: RegExp;
    try {
      regex = compileDenyPattern(pattern);
    } catch (error) {
      if (!(error instanceof MalformedPatternError)) {
        throw error;
      }
      logger.debug('Skipping deny-uri pattern', { pattern, error: error.message });
      continue;
    }

    if (regex.test(uri)) {
      return true;
    }
  }

  return false;
}
