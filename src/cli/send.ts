// src/cli/send.ts
import type { Writable } from 'node:stream';
import { z } from 'zod';
import { DEFAULT_PORT } from '../config.js';

// ═══════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════

export interface SendClientOptions {
  /** Gateway base URL. Default: http://127.0.0.1:8080 */
  baseUrl?: string;
  json?: boolean;
  stdout?: Writable;
  fetch?: typeof fetch;
}

export interface SendArgs {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

const ReplySchema = z.object({
  response: z.string(),
  error: z.string().nullable().optional(),
});

export const DEFAULT_BASE_URL = `http://127.0.0.1:${DEFAULT_PORT}`;

// ═══════════════════════════════════════════════════════
// Send Client
// ═══════════════════════════════════════════════════════

export function createSendClient(opts: SendClientOptions = {}) {
  const baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const stdout = opts.stdout ?? process.stdout;
  const fetchFn = opts.fetch ?? fetch;

  async function post(path: string, body?: unknown): Promise<z.infer<typeof ReplySchema>> {
    const response = await fetchFn(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });

    const text = await response.text();
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new Error(`Server error (${response.status}): ${text}`);
    }

    const reply = ReplySchema.safeParse(data);
    if (!reply.success) {
      throw new Error(`Server error (${response.status}): unexpected reply ${text}`);
    }
    if (!response.ok || reply.data.error) {
      throw new Error(reply.data.error ?? `Server error (${response.status})`);
    }
    return reply.data;
  }

  async function send(args: SendArgs): Promise<void> {
    const reply = await post('/completion', args);
    stdout.write(opts.json ? JSON.stringify(reply, null, 2) + '\n' : reply.response + '\n');
  }

  async function reset(): Promise<void> {
    const reply = await post('/reset');
    stdout.write(opts.json ? JSON.stringify(reply, null, 2) + '\n' : reply.response + '\n');
  }

  return { send, reset };
}

// ═══════════════════════════════════════════════════════
// CLI Entry Points
// ═══════════════════════════════════════════════════════

function parseNumberFlag(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(n)) {
    throw new Error(`${flag} expects a number`);
  }
  return n;
}

export interface ParsedSendArgs extends Partial<SendArgs> {
  baseUrl?: string;
  json: boolean;
  fromStdin: boolean;
}

export function parseSendArgs(args: string[]): ParsedSendArgs {
  const out: ParsedSendArgs = { json: false, fromStdin: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--url') {
      out.baseUrl = args[++i];
    } else if (arg === '--system' || arg === '-s') {
      out.systemPrompt = args[++i];
    } else if (arg === '--temperature' || arg === '-t') {
      out.temperature = parseNumberFlag(arg, args[++i]);
    } else if (arg === '--max-tokens') {
      out.maxTokens = parseNumberFlag(arg, args[++i]);
    } else if (arg === '--json') {
      out.json = true;
    } else if (arg === '--stdin' || arg === '-') {
      out.fromStdin = true;
    } else if (out.prompt === undefined) {
      out.prompt = arg;
    }
  }
  return out;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function runSend(args: string[]): Promise<void> {
  const parsed = parseSendArgs(args);
  const prompt = parsed.fromStdin ? await readStdin() : parsed.prompt;

  if (!prompt) {
    throw new Error('prompt required (provide as argument or use --stdin)');
  }

  const client = createSendClient({ baseUrl: parsed.baseUrl, json: parsed.json });
  await client.send({
    prompt,
    ...(parsed.systemPrompt !== undefined ? { systemPrompt: parsed.systemPrompt } : {}),
    ...(parsed.temperature !== undefined ? { temperature: parsed.temperature } : {}),
    ...(parsed.maxTokens !== undefined ? { maxTokens: parsed.maxTokens } : {}),
  });
}

export async function runReset(args: string[]): Promise<void> {
  const parsed = parseSendArgs(args);
  await createSendClient({ baseUrl: parsed.baseUrl, json: parsed.json }).reset();
}
