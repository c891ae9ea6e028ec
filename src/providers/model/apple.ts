/**
 * Apple Foundation Models provider.
 *
 * The framework is only reachable from native code, so this provider drives a
 * small bridge executable (configured as providers.apple.bridge_command) over
 * newline-delimited JSON on its stdin/stdout:
 *
 *   → {"id":1,"op":"availability"}
 *   ← {"id":1,"ok":true,"result":{"available":true}}
 *   → {"id":2,"op":"create_session"}
 *   ← {"id":2,"ok":true,"result":{"session":"s-1"}}
 *   → {"id":3,"op":"respond","session":"s-1","prompt":"Hi","options":{"temperature":0}}
 *   ← {"id":3,"ok":true,"result":{"text":"Hello!"}}
 *   → {"id":4,"op":"dispose_session","session":"s-1"}
 *   ← {"id":4,"ok":true}
 *
 * Failed ops reply {"id":n,"ok":false,"error":"..."}. Replies may arrive in
 * any order and are matched by id. The bridge process lives as long as the
 * provider.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import type { ModelProvider, SessionHandle, GenerationOptions } from './types.js';
import type { Config } from '../../types.js';
import { getLogger, truncate } from '../../logger.js';
import { errorMessage } from '../../errors.js';

const logger = getLogger().child({ component: 'apple-bridge' });

// ───────────────────────────────────────────────────────
// Wire types
// ───────────────────────────────────────────────────────

export type BridgeOp = 'availability' | 'create_session' | 'respond' | 'dispose_session';

interface BridgeRequest {
  id: number;
  op: BridgeOp;
  session?: string;
  prompt?: string;
  options?: GenerationOptions;
}

const BridgeReplySchema = z.object({
  id: z.number().int(),
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const AvailabilityResultSchema = z.object({
  available: z.boolean(),
  reason: z.string().optional(),
});

const SessionResultSchema = z.object({ session: z.string().min(1) });

const RespondResultSchema = z.object({ text: z.string() });

/** The two pipes of a running bridge, plus a hook to stop it. */
export interface BridgeTransport {
  stdin: Writable;
  stdout: Readable;
  /** Register a callback for when the bridge goes away. */
  onExit(listener: (reason: string) => void): void;
  kill(): void;
}

interface Pending {
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
}

// ───────────────────────────────────────────────────────
// Bridge client
// ───────────────────────────────────────────────────────

export class BridgeClient {
  private nextId = 1;
  private readonly pending = new Map<number, Pending>();
  private exitReason: string | null = null;

  constructor(private readonly transport: BridgeTransport) {
    const lines = createInterface({ input: transport.stdout, crlfDelay: Infinity });
    lines.on('line', (line) => this.onLine(line));
    transport.onExit((reason) => this.failAll(reason));
  }

  get exited(): boolean {
    return this.exitReason !== null;
  }

  call(op: BridgeOp, fields: Omit<BridgeRequest, 'id' | 'op'> = {}): Promise<unknown> {
    if (this.exitReason !== null) {
      return Promise.reject(new Error(`Foundation Models bridge exited: ${this.exitReason}`));
    }
    const id = this.nextId++;
    const request: BridgeRequest = { id, op, ...fields };
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.transport.stdin.write(JSON.stringify(request) + '\n', (err) => {
        if (err) {
          this.pending.delete(id);
          reject(err);
        }
      });
    });
  }

  close(): void {
    this.failAll('closed');
    this.transport.kill();
  }

  private onLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      logger.warn('bridge_bad_line', { line: truncate(trimmed, 200) });
      return;
    }

    const parsed = BridgeReplySchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('bridge_bad_reply', { line: truncate(trimmed, 200) });
      return;
    }

    const reply = parsed.data;
    const waiter = this.pending.get(reply.id);
    if (!waiter) {
      logger.debug('bridge_orphan_reply', { id: reply.id });
      return;
    }
    this.pending.delete(reply.id);

    if (reply.ok) {
      waiter.resolve(reply.result);
    } else {
      waiter.reject(new Error(reply.error ?? 'bridge call failed'));
    }
  }

  private failAll(reason: string): void {
    if (this.exitReason === null) this.exitReason = reason;
    const err = new Error(`Foundation Models bridge exited: ${reason}`);
    for (const waiter of this.pending.values()) {
      waiter.reject(err);
    }
    this.pending.clear();
  }
}

// ───────────────────────────────────────────────────────
// Provider
// ───────────────────────────────────────────────────────

export function createBridgeProvider(client: BridgeClient): ModelProvider {
  return {
    name: 'apple',

    async isAvailable(): Promise<boolean> {
      try {
        const result = AvailabilityResultSchema.parse(await client.call('availability'));
        if (!result.available) {
          logger.warn('model_unavailable', { reason: result.reason ?? 'unknown' });
        }
        return result.available;
      } catch (err) {
        logger.warn('availability_check_failed', { error: errorMessage(err) });
        return false;
      }
    },

    async createSession(): Promise<SessionHandle> {
      const { session } = SessionResultSchema.parse(await client.call('create_session'));
      return { id: session };
    },

    async respond(session: SessionHandle, prompt: string, options: GenerationOptions): Promise<string> {
      const result = await client.call('respond', { session: session.id, prompt, options });
      return RespondResultSchema.parse(result).text;
    },

    async disposeSession(session: SessionHandle): Promise<void> {
      await client.call('dispose_session', { session: session.id });
    },

    async close(): Promise<void> {
      client.close();
    },
  };
}

/** Spawn the bridge executable and wrap its stdio as a transport. */
export function spawnBridge(command: string[]): BridgeTransport {
  const [cmd, ...args] = command;
  const child = spawn(cmd, args, { stdio: ['pipe', 'pipe', 'pipe'] });

  const stderr = createInterface({ input: child.stderr, crlfDelay: Infinity });
  stderr.on('line', (line) => logger.debug('bridge_stderr', { line: truncate(line, 500) }));

  // Writes after the child died surface here; the exit hook fails the callers.
  child.stdin.on('error', (err) => logger.debug('bridge_stdin_error', { error: err.message }));

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    onExit(listener) {
      child.on('error', (err) => listener(err.message));
      child.on('exit', (code, signal) => listener(signal ? `signal ${signal}` : `code ${code ?? 1}`));
    },
    kill() {
      if (child.exitCode === null && !child.killed) child.kill();
    },
  };
}

export async function create(config: Config): Promise<ModelProvider> {
  const command = config.providers.apple.bridge_command;
  logger.debug('bridge_spawn', { command: command.join(' ') });
  return createBridgeProvider(new BridgeClient(spawnBridge(command)));
}
