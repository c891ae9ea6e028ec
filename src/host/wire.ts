/**
 * Wire parser: turns one node:http request into method, path, headers and
 * an optional UTF-8 body.
 *
 * Request-line and header parsing is Node's; a request line it rejects never
 * gets here and is answered from the server's clientError hook instead.
 */

import type { IncomingHttpHeaders, IncomingMessage } from 'node:http';
import { WireError } from '../errors.js';

export interface ParsedRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
  /** Undefined when the request carried no body bytes. */
  body?: string;
}

export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Request target without query string or fragment. */
export function pathOf(target: string | undefined): string {
  const raw = target ?? '/';
  const cut = raw.search(/[?#]/);
  return cut === -1 ? raw : raw.slice(0, cut);
}

/** Strict UTF-8 decode; undecodable bytes are an InvalidEncoding failure. */
export function decodeBody(bytes: Uint8Array): string | undefined {
  if (bytes.length === 0) return undefined;
  try {
    return utf8.decode(bytes);
  } catch {
    throw new WireError('InvalidEncoding');
  }
}

export async function readBody(req: IncomingMessage, maxBytes = DEFAULT_MAX_BODY_BYTES): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > maxBytes) throw new WireError('BodyTooLarge');
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

export async function parseRequest(req: IncomingMessage, maxBytes = DEFAULT_MAX_BODY_BYTES): Promise<ParsedRequest> {
  if (!req.method || !req.url) {
    throw new WireError('MalformedRequestLine');
  }
  const bytes = await readBody(req, maxBytes);
  return {
    method: req.method.toUpperCase(),
    path: pathOf(req.url),
    headers: req.headers,
    body: decodeBody(bytes),
  };
}
