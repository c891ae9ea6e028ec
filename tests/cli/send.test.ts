import { describe, test, expect, vi } from 'vitest';
import { Writable } from 'node:stream';
import { createSendClient, parseSendArgs, runSend, DEFAULT_BASE_URL } from '../../src/cli/send.js';

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(chunk.toString());
      cb();
    },
  });
  return { stream, output: () => chunks.join('') };
}

function fakeFetch(status: number, body: string) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }));
}

describe('createSendClient', () => {
  test('posts the request to /completion and prints the reply', async () => {
    const out = capture();
    const fetch = fakeFetch(200, JSON.stringify({ response: 'Paris', error: null }));
    const client = createSendClient({ baseUrl: 'http://127.0.0.1:9999/', stdout: out.stream, fetch });

    await client.send({ prompt: 'Capital of France?', systemPrompt: 'One word', temperature: 0 });

    expect(fetch).toHaveBeenCalledWith('http://127.0.0.1:9999/completion', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"prompt":"Capital of France?","systemPrompt":"One word","temperature":0}',
    });
    expect(out.output()).toBe('Paris\n');
  });

  test('--json prints the whole reply', async () => {
    const out = capture();
    const fetch = fakeFetch(200, JSON.stringify({ response: 'Paris', error: null }));
    const client = createSendClient({ stdout: out.stream, fetch, json: true });

    await client.send({ prompt: 'x' });

    expect(out.output()).toBe('{\n  "response": "Paris",\n  "error": null\n}\n');
    expect(fetch.mock.calls[0][0]).toBe(`${DEFAULT_BASE_URL}/completion`);
  });

  test('surfaces the gateway error message', async () => {
    const out = capture();
    const fetch = fakeFetch(400, JSON.stringify({ response: '', error: 'AI error: guardrail violation' }));
    const client = createSendClient({ stdout: out.stream, fetch });

    await expect(client.send({ prompt: 'x' })).rejects.toThrow('AI error: guardrail violation');
    expect(out.output()).toBe('');
  });

  test('a non-JSON reply is a server error', async () => {
    const fetch = fakeFetch(500, 'oops');
    const client = createSendClient({ stdout: capture().stream, fetch });

    await expect(client.send({ prompt: 'x' })).rejects.toThrow('Server error (500): oops');
  });

  test('reset posts an empty request to /reset', async () => {
    const out = capture();
    const fetch = fakeFetch(200, JSON.stringify({ response: 'Session reset', error: null }));
    const client = createSendClient({ stdout: out.stream, fetch });

    await client.reset();

    expect(fetch).toHaveBeenCalledWith(`${DEFAULT_BASE_URL}/reset`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
    });
    expect(out.output()).toBe('Session reset\n');
  });
});

describe('parseSendArgs', () => {
  test('takes the first bare argument as the prompt', () => {
    expect(parseSendArgs(['hello', 'world'])).toEqual({ prompt: 'hello', json: false, fromStdin: false });
  });

  test('parses every flag', () => {
    expect(parseSendArgs([
      '--url', 'http://127.0.0.1:9090',
      '-s', 'Be brief',
      '-t', '0.5',
      '--max-tokens', '64',
      '--json',
      'Hi',
    ])).toEqual({
      baseUrl: 'http://127.0.0.1:9090',
      systemPrompt: 'Be brief',
      temperature: 0.5,
      maxTokens: 64,
      json: true,
      fromStdin: false,
      prompt: 'Hi',
    });
  });

  test('- reads from stdin', () => {
    expect(parseSendArgs(['-']).fromStdin).toBe(true);
  });

  test('rejects non-numeric temperatures', () => {
    expect(() => parseSendArgs(['-t', 'hot'])).toThrow('-t expects a number');
    expect(() => parseSendArgs(['--max-tokens'])).toThrow('--max-tokens expects a number');
  });
});

describe('runSend', () => {
  test('requires a prompt', async () => {
    await expect(runSend(['--json'])).rejects.toThrow('prompt required (provide as argument or use --stdin)');
  });
});
