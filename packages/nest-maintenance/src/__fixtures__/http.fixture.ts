import { ResponseLike } from '../http/response';
import { HeaderMap, RequestLike } from '../utils/ip';
import { LoggerPort } from '../utils/logger.interface';

export interface FakeRequestInit {
  remoteAddress?: string;
  remotePort?: number;
  headers?: HeaderMap;
  url?: string;
}

export function fakeRequest(init: FakeRequestInit = {}): RequestLike {
  return {
    headers: init.headers ?? {},
    socket: { remoteAddress: init.remoteAddress, remotePort: init.remotePort },
    url: init.url ?? '/',
  };
}

/** Records what a raw Node `ServerResponse` would have sent. */
export class FakeResponse implements ResponseLike {
  statusCode = 200;
  headers: Record<string, string> = {};
  body?: Buffer;

  setHeader(name: string, value: string): void {
    this.headers[name.toLowerCase()] = value;
  }

  writeHead(statusCode: number): void {
    this.statusCode = statusCode;
  }

  end(chunk: Buffer): void {
    this.body = chunk;
  }
}

/** Express-style response without `writeHead`/`end`. */
export class FakeExpressResponse implements ResponseLike {
  statusCode = 200;
  headers: Record<string, string> = {};
  body?: Buffer;

  set(name: string, value: string): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  send(body: Buffer): this {
    this.body = body;
    return this;
  }
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export class RecordingLogger implements LoggerPort {
  readonly entries: LogEntry[] = [];

  debug(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, meta });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, meta });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, meta });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, meta });
  }

  at(level: LogEntry['level']): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }
}
