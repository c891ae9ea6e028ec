import { describe, test, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';
import { BridgeClient, createBridgeProvider, type BridgeTransport } from '../../../src/providers/model/apple.js';

// ───────────────────────────────────────────────────────
// Helpers
// ───────────────────────────────────────────────────────

interface SeenRequest {
  id: number;
  op: string;
  session?: string;
  prompt?: string;
  options?: Record<string, unknown>;
}

type Reply = Record<string, unknown> | null;

/**
 * In-process bridge: reads NDJSON requests from the client's stdin pipe and
 * answers through `handler`. A null answer leaves the request pending.
 */
function fakeBridge(handler: (req: SeenRequest) => Reply = () => null) {
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  const requests: SeenRequest[] = [];
  let exitListener: ((reason: string) => void) | undefined;

  const transport: BridgeTransport = {
    stdin,
    stdout,
    onExit(listener) { exitListener = listener; },
    kill: vi.fn(),
  };

  createInterface({ input: stdin }).on('line', (line) => {
    const req: SeenRequest = JSON.parse(line);
    requests.push(req);
    const reply = handler(req);
    if (reply) stdout.write(JSON.stringify(reply) + '\n');
  });

  return {
    transport,
    requests,
    send(line: string) { stdout.write(line + '\n'); },
    exit(reason: string) { exitListener?.(reason); },
  };
}

/** Wait until the fake bridge has seen `n` requests. */
async function seen(requests: SeenRequest[], n: number): Promise<void> {
  await vi.waitFor(() => expect(requests.length).toBeGreaterThanOrEqual(n));
}

/** A well-behaved bridge with one model session. */
function workingBridge(available = true) {
  return fakeBridge((req) => {
    switch (req.op) {
      case 'availability':
        return { id: req.id, ok: true, result: available ? { available: true } : { available: false, reason: 'appleIntelligenceNotEnabled' } };
      case 'create_session':
        return { id: req.id, ok: true, result: { session: 's-1' } };
      case 'respond':
        return { id: req.id, ok: true, result: { text: `model says: ${req.prompt}` } };
      case 'dispose_session':
        return { id: req.id, ok: true };
      default:
        return { id: req.id, ok: false, error: `unknown op ${req.op}` };
    }
  });
}

// ───────────────────────────────────────────────────────
// BridgeClient
// ───────────────────────────────────────────────────────

describe('BridgeClient', () => {
  test('writes one JSON line per call with increasing ids', async () => {
    const bridge = workingBridge();
    const client = new BridgeClient(bridge.transport);

    await client.call('availability');
    await client.call('create_session');

    expect(bridge.requests).toEqual([
      { id: 1, op: 'availability' },
      { id: 2, op: 'create_session' },
    ]);
  });

  test('matches replies by id when they arrive out of order', async () => {
    const bridge = fakeBridge();
    const client = new BridgeClient(bridge.transport);

    const first = client.call('respond', { session: 's-1', prompt: 'first', options: {} });
    const second = client.call('respond', { session: 's-1', prompt: 'second', options: {} });
    await seen(bridge.requests, 2);

    bridge.send(JSON.stringify({ id: 2, ok: true, result: { text: 'two' } }));
    bridge.send(JSON.stringify({ id: 1, ok: true, result: { text: 'one' } }));

    expect(await first).toEqual({ text: 'one' });
    expect(await second).toEqual({ text: 'two' });
  });

  test('a failed op rejects with the bridge error', async () => {
    const bridge = fakeBridge((req) => ({ id: req.id, ok: false, error: 'Exceeded model context window size' }));
    const client = new BridgeClient(bridge.transport);

    await expect(client.call('respond', { session: 's-1', prompt: 'x' })).rejects.toThrow('Exceeded model context window size');
  });

  test('ignores lines that are not replies', async () => {
    const bridge = fakeBridge();
    const client = new BridgeClient(bridge.transport);

    const pending = client.call('availability');
    await seen(bridge.requests, 1);

    bridge.send('bridge starting up');
    bridge.send(JSON.stringify({ hello: 'world' }));
    bridge.send(JSON.stringify({ id: 99, ok: true }));
    bridge.send(JSON.stringify({ id: 1, ok: true, result: { available: true } }));

    expect(await pending).toEqual({ available: true });
  });

  test('bridge exit fails pending and later calls', async () => {
    const bridge = fakeBridge();
    const client = new BridgeClient(bridge.transport);

    const pending = client.call('respond', { session: 's-1', prompt: 'x' });
    await seen(bridge.requests, 1);
    bridge.exit('code 1');

    await expect(pending).rejects.toThrow('Foundation Models bridge exited: code 1');
    await expect(client.call('availability')).rejects.toThrow('Foundation Models bridge exited: code 1');
    expect(client.exited).toBe(true);
  });

  test('close kills the bridge', () => {
    const bridge = fakeBridge();
    const client = new BridgeClient(bridge.transport);

    client.close();

    expect(bridge.transport.kill).toHaveBeenCalledTimes(1);
    expect(client.exited).toBe(true);
  });
});

// ───────────────────────────────────────────────────────
// Provider
// ───────────────────────────────────────────────────────

describe('apple model provider', () => {
  test('reports availability from the bridge', async () => {
    expect(await createBridgeProvider(new BridgeClient(workingBridge().transport)).isAvailable()).toBe(true);
    expect(await createBridgeProvider(new BridgeClient(workingBridge(false).transport)).isAvailable()).toBe(false);
  });

  test('is unavailable once the bridge is gone', async () => {
    const bridge = workingBridge();
    const provider = createBridgeProvider(new BridgeClient(bridge.transport));
    bridge.exit('spawn fm-bridge ENOENT');

    expect(await provider.isAvailable()).toBe(false);
  });

  test('creates a session and responds through it', async () => {
    const bridge = workingBridge();
    const provider = createBridgeProvider(new BridgeClient(bridge.transport));

    const session = await provider.createSession();
    const text = await provider.respond(session, 'Hi', { temperature: 0, maxTokens: 16 });

    expect(session).toEqual({ id: 's-1' });
    expect(text).toBe('model says: Hi');
    expect(bridge.requests[1]).toEqual({
      id: 2,
      op: 'respond',
      session: 's-1',
      prompt: 'Hi',
      options: { temperature: 0, maxTokens: 16 },
    });
  });

  test('rejects a respond result without text', async () => {
    const bridge = fakeBridge((req) => ({ id: req.id, ok: true, result: { words: 'nope' } }));
    const provider = createBridgeProvider(new BridgeClient(bridge.transport));

    await expect(provider.respond({ id: 's-1' }, 'Hi', {})).rejects.toThrow();
  });

  test('disposes sessions and closes the bridge', async () => {
    const bridge = workingBridge();
    const provider = createBridgeProvider(new BridgeClient(bridge.transport));

    await provider.disposeSession?.({ id: 's-1' });
    await provider.close?.();

    expect(bridge.requests).toEqual([{ id: 1, op: 'dispose_session', session: 's-1' }]);
    expect(bridge.transport.kill).toHaveBeenCalledTimes(1);
  });
});
