/**
 * HTTP utilities: CORS headers and buffered JSON replies.
 *
 * Every reply closes its connection and carries a Content-Length; nothing is
 * streamed or chunked.
 */

import { STATUS_CODES, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import type { CompletionResponse } from '../types.js';

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

export function sendJson(res: ServerResponse, status: number, payload: CompletionResponse): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, {
    ...CORS_HEADERS,
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
    'Connection': 'close',
  });
  res.end(body);
}

export function sendEmpty(res: ServerResponse, status: number): void {
  res.writeHead(status, { ...CORS_HEADERS, 'Connection': 'close' });
  res.end();
}

export function sendError(res: ServerResponse, status: number, message: string): void {
  sendJson(res, status, { response: '', error: message });
}

/** Raw HTTP/1.1 error reply for sockets Node's parser gave up on. */
export function rawErrorResponse(status: number, message: string): string {
  const body = JSON.stringify({ response: '', error: message } satisfies CompletionResponse);
  const headers = Object.entries(CORS_HEADERS).map(([k, v]) => `${k}: ${v}\r\n`).join('');
  return `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\n` +
    headers +
    'Content-Type: application/json\r\n' +
    `Content-Length: ${Buffer.byteLength(body)}\r\n` +
    'Connection: close\r\n' +
    '\r\n' +
    body;
}

export function writeRawError(socket: Duplex, status: number, message: string): void {
  if (socket.writable) {
    socket.end(rawErrorResponse(status, message));
  } else {
    socket.destroy();
  }
}
