/** Response methods used across Express (`status`/`send`/`set`) and raw Node (`setHeader`/`writeHead`/`end`). */
export interface ResponseLike {
  setHeader?(name: string, value: string): unknown;
  header?(name: string, value: string): unknown;
  set?(name: string, value: string): unknown;
  writeHead?(statusCode: number): unknown;
  end?(chunk: Buffer): unknown;
  status?(code: number): unknown;
  send?(body: Buffer): unknown;
}

/** Applies response headers across common response adapters (`setHeader`, `header`, `set`). */
export function applyHeaders(res: ResponseLike, headers: Record<string, string>): void {
  for (const [key, value] of Object.entries(headers)) {
    if (typeof res.setHeader === 'function') {
      res.setHeader(key, value);
      continue;
    }

    if (typeof res.header === 'function') {
      res.header(key, value);
      continue;
    }

    if (typeof res.set === 'function') {
      res.set(key, value);
    }
  }
}

/** Writes status, a single `Content-Type` header and the body. Throws when the response cannot be written. */
export function writeMaintenanceResponse(
  res: ResponseLike,
  status: number,
  contentType: string,
  body: Buffer,
): void {
  applyHeaders(res, { 'Content-Type': contentType });

  if (typeof res.writeHead === 'function' && typeof res.end === 'function') {
    res.writeHead(status);
    res.end(body);
    return;
  }

  if (typeof res.status === 'function' && typeof res.send === 'function') {
    res.status(status);
    res.send(body);
    return;
  }

  throw new TypeError('response supports neither writeHead/end nor status/send');
}
