/**
 * node:http <-> Web Request/Response bridge.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';

const BODYLESS_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

async function readBody(req: IncomingMessage): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

export async function toRequest(req: IncomingMessage): Promise<Request> {
  const method = req.method ?? 'GET';
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else {
      headers.set(name, value);
    }
  }

  const body = BODYLESS_METHODS.has(method) ? undefined : await readBody(req);
  return new Request(url, { method, headers, body });
}

export async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });

  const body = response.body === null ? null : Buffer.from(await response.arrayBuffer());
  res.end(body ?? undefined);
}
