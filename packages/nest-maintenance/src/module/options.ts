import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { MaintenanceFiles } from '../content/content.source';
import { describeError, MaintenanceConfigError } from '../utils/errors';
import { LogLevel } from '../utils/logger';
import { LoggerPort } from '../utils/logger.interface';

/** Maintenance settings; the same keys are accepted from a JSON config file. */
export interface MaintenanceSettings {
  /** Master switch. Defaults to `false`. */
  enabled?: boolean;
  /** Maintenance content file. Required. */
  filename?: string;
  /** When set, maintenance applies only while this file exists. */
  triggerFilename?: string;
  /** Defaults to `503`. */
  httpResponseCode?: number;
  /** Defaults to `text/html; charset=utf-8`. */
  httpContentType?: string;
  /**
   * CIDR ranges exempt from the maintenance page. An empty list exempts nobody.
   *
   * A string is split on commas and each part trimmed. Array entries are kept as given,
   * so `' 10.0.0.0/8'` or `'10.0.0.0/8,bogus'` is a malformed range and is skipped.
   */
  ipAllowList?: string | string[];
  /**
   * Regular expressions matched against the request URI; a match always shows the page.
   *
   * Patterns run on the backtracking `RegExp` engine against a client-controlled URI on every
   * request while maintenance is active. Nested or overlapping quantifiers such as `^/(a+)+$`
   * take exponential time on crafted input; keep patterns linear (plain prefixes, anchored
   * literals, single quantifiers).
   */
  denyUri?: string[];
  /** Values for `[[ name ]]` placeholders. Without it the content is served byte-for-byte. */
  variables?: Record<string, string>;
}

/** Top-level `MaintenanceModule` configuration. */
export interface MaintenanceModuleOptions extends MaintenanceSettings {
  /**
   * JSON file holding `MaintenanceSettings`, resolved from `process.cwd()`.
   * Inline options override file values. Falls back to `MAINTENANCE_CONFIG`.
   */
  loadFrom?: string;
  /** Runtime event logging (served / fall-through). Defaults to `true`. */
  logging?: boolean;
  /** Debug-logs every deny-uri pattern evaluation. Defaults to `false`. */
  logDenyUriChecks?: boolean;
  /** Minimum level printed by the default console logger. Defaults to `info`; ignored with `logger`. */
  logLevel?: LogLevel;
  logger?: LoggerPort;
  /** Content and trigger access; defaults to the local filesystem. */
  files?: MaintenanceFiles;
}

/** Fully normalized options used by `MaintenanceRuntime`. */
export interface MaintenanceResolvedOptions {
  readonly enabled: boolean;
  readonly filename: string;
  readonly triggerFilename?: string;
  readonly httpResponseCode: number;
  readonly httpContentType: string;
  readonly ipAllowList: readonly string[];
  readonly denyUri: readonly string[];
  readonly variables?: Readonly<Record<string, string>>;
  readonly logging: boolean;
  readonly logDenyUriChecks: boolean;
  readonly logLevel: LogLevel;
  readonly logger?: LoggerPort;
  readonly files?: MaintenanceFiles;
}

export const DEFAULT_HTTP_RESPONSE_CODE = 503;
export const DEFAULT_HTTP_CONTENT_TYPE = 'text/html; charset=utf-8';
/** Environment variable naming a config file when `loadFrom` is not given. */
export const MAINTENANCE_CONFIG_ENV = 'MAINTENANCE_CONFIG';

/** Validates and normalizes user config into runtime-ready options. */
export function resolveMaintenanceOptions(input: MaintenanceModuleOptions = {}): MaintenanceResolvedOptions {
  const configPath = input.loadFrom ?? process.env[MAINTENANCE_CONFIG_ENV];
  const file = configPath ? loadSettingsFile(configPath) : {};

  const filename = input.filename ?? file.filename ?? '';
  if (!filename.trim()) {
    throw new MaintenanceConfigError('filename cannot be empty');
  }

  const httpResponseCode = input.httpResponseCode ?? file.httpResponseCode ?? DEFAULT_HTTP_RESPONSE_CODE;
  if (!Number.isInteger(httpResponseCode) || httpResponseCode < 100 || httpResponseCode > 599) {
    throw new MaintenanceConfigError(`httpResponseCode must be an integer between 100 and 599, got ${httpResponseCode}`);
  }

  const triggerFilename = input.triggerFilename ?? file.triggerFilename ?? '';
  const httpContentType = (input.httpContentType ?? file.httpContentType ?? '').trim();
  const variables = input.variables ?? file.variables;

  return Object.freeze({
    enabled: input.enabled ?? file.enabled ?? false,
    filename,
    triggerFilename: triggerFilename.trim() ? triggerFilename : undefined,
    httpResponseCode,
    httpContentType: httpContentType || DEFAULT_HTTP_CONTENT_TYPE,
    ipAllowList: Object.freeze(normalizeCidrs(input.ipAllowList ?? file.ipAllowList)),
    denyUri: Object.freeze([...(input.denyUri ?? file.denyUri ?? [])]),
    variables: variables ? Object.freeze({ ...variables }) : undefined,
    logging: input.logging ?? true,
    logDenyUriChecks: input.logDenyUriChecks ?? false,
    logLevel: input.logLevel ?? 'info',
    logger: input.logger,
    files: input.files,
  });
}

/** Reads and validates a JSON settings file. */
export function loadSettingsFile(pathLike: string): MaintenanceSettings {
  const resolved = resolve(process.cwd(), pathLike);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new MaintenanceConfigError(`failed to load config file ${resolved}: ${describeError(error)}`, {
      cause: error,
    });
  }

  return parseSettings(parsed, resolved);
}

/** Checks the shape of untrusted settings (e.g. parsed JSON). Unknown keys are ignored. */
export function parseSettings(raw: unknown, source = 'config'): MaintenanceSettings {
  if (!isRecord(raw)) {
    throw new MaintenanceConfigError(`${source} must contain a JSON object`);
  }

  const out: MaintenanceSettings = {};

  if (raw.enabled !== undefined) {
    if (typeof raw.enabled !== 'boolean') {
      throw invalidField(source, 'enabled', 'a boolean');
    }
    out.enabled = raw.enabled;
  }

  for (const key of ['filename', 'triggerFilename', 'httpContentType'] as const) {
    const value = raw[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      throw invalidField(source, key, 'a string');
    }
    out[key] = value;
  }

  if (raw.httpResponseCode !== undefined) {
    if (typeof raw.httpResponseCode !== 'number') {
      throw invalidField(source, 'httpResponseCode', 'a number');
    }
    out.httpResponseCode = raw.httpResponseCode;
  }

  if (raw.ipAllowList !== undefined) {
    const value = raw.ipAllowList;
    if (typeof value === 'string') {
      out.ipAllowList = value;
    } else if (isStringArray(value)) {
      out.ipAllowList = value;
    } else {
      throw invalidField(source, 'ipAllowList', 'a string or an array of strings');
    }
  }

  if (raw.denyUri !== undefined) {
    if (!isStringArray(raw.denyUri)) {
      throw invalidField(source, 'denyUri', 'an array of strings');
    }
    out.denyUri = raw.denyUri;
  }

  if (raw.variables !== undefined) {
    const value = raw.variables;
    if (!isRecord(value) || !Object.values(value).every((item) => typeof item === 'string')) {
      throw invalidField(source, 'variables', 'an object of string values');
    }
    out.variables = Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
  }

  return out;
}

function normalizeCidrs(cidrs: string | string[] | undefined): string[] {
  if (!cidrs) {
    return [];
  }

  if (Array.isArray(cidrs)) {
    return cidrs.filter((cidr) => cidr !== '');
  }

  return cidrs
    .split(',')
    .map((cidr) => cidr.trim())
    .filter((cidr) => Boolean(cidr));
}

function invalidField(source: string, key: string, expected: string): MaintenanceConfigError {
  return new MaintenanceConfigError(`${source}: ${key} must be ${expected}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
