/**
 * Request dispatcher: routes a parsed request to preflight, /reset,
 * /completion or 404 and builds the JSON reply.
 *
 * handle() never throws: every failure becomes a CompletionResponse with an
 * error message and a status code.
 */

import { z } from 'zod';
import type { CompletionRequest, CompletionResponse } from '../types.js';
import { GatewayError, SessionBusyError, errorMessage } from '../errors.js';
import { getLogger, preview, type Logger } from '../logger.js';

// =====================================================
// Types
// =====================================================

/** What the dispatcher needs from the gateway. */
export interface CompletionService {
  generate(prompt: string, systemPrompt?: string, temperature?: number, maxTokens?: number): Promise<string>;
  reset(): Promise<void>;
}

export interface DispatchRequest {
  method: string;
  path: string;
  body?: string;
}

export interface DispatchResult {
  status: number;
  /** Null for the 204 preflight reply. */
  body: CompletionResponse | null;
}

export interface DispatcherOptions {
  /** Status for generation failures. Default 400. */
  errorStatus?: number;
  logger?: Logger;
}

export const NOT_FOUND_MESSAGE = 'Use POST /completion or /reset';

// `null` optionals are accepted and treated as absent.
const CompletionRequestSchema = z.object({
  prompt: z.string().min(1),
  systemPrompt: z.string().nullish(),
  temperature: z.number().finite().nullish(),
  maxTokens: z.number().int().positive().nullish(),
});

// =====================================================
// Helpers
// =====================================================

function ok(response: string): DispatchResult {
  return { status: 200, body: { response, error: null } };
}

function fail(status: number, error: string): DispatchResult {
  return { status, body: { response: '', error } };
}

export type ParseOutcome =
  | { ok: true; request: CompletionRequest }
  | { ok: false; issues: string };

/** Decode and validate a /completion body. */
export function parseCompletionRequest(body: string): ParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return { ok: false, issues: errorMessage(err) };
  }

  const parsed = CompletionRequestSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    };
  }

  const { prompt, systemPrompt, temperature, maxTokens } = parsed.data;
  const request: CompletionRequest = { prompt };
  if (systemPrompt != null) request.systemPrompt = systemPrompt;
  if (temperature != null) request.temperature = temperature;
  if (maxTokens != null) request.maxTokens = maxTokens;
  return { ok: true, request };
}

// =====================================================
// Dispatcher
// =====================================================

export function createDispatcher(service: CompletionService, opts: DispatcherOptions = {}) {
  const errorStatus = opts.errorStatus ?? 400;
  const logger = opts.logger ?? getLogger().child({ component: 'dispatcher' });

  async function handleReset(): Promise<DispatchResult> {
    try {
      await service.reset();
      return ok('Session reset');
    } catch (err) {
      logger.error('reset_failed', { error: errorMessage(err) });
      return fail(err instanceof SessionBusyError ? err.status : errorStatus, `Reset failed: ${errorMessage(err)}`);
    }
  }

  async function handleCompletion(body: string | undefined): Promise<DispatchResult> {
    if (body === undefined) {
      return fail(400, 'No request body');
    }

    const parsed = parseCompletionRequest(body);
    if (!parsed.ok) {
      logger.debug('invalid_completion_body', { issues: parsed.issues });
      return fail(400, 'Invalid JSON');
    }

    const { prompt, systemPrompt, temperature, maxTokens } = parsed.request;
    logger.info('completion_request', { prompt: preview(prompt) });

    try {
      const text = await service.generate(prompt, systemPrompt, temperature, maxTokens);
      logger.info('completion_response', { response: preview(text) });
      return ok(text);
    } catch (err) {
      const message = errorMessage(err);
      logger.error('completion_failed', { error: message, code: err instanceof GatewayError ? err.code : undefined });
      if (err instanceof SessionBusyError) return fail(err.status, message);
      if (err instanceof GatewayError) return fail(errorStatus, `AI error: ${message}`);
      return fail(500, 'Internal server error');
    }
  }

  async function handle(req: DispatchRequest): Promise<DispatchResult> {
    const method = req.method.toUpperCase();

    if (method === 'OPTIONS') {
      return { status: 204, body: null };
    }

    if (method === 'POST' && req.path === '/reset') {
      return handleReset();
    }

    if (method === 'POST' && req.path === '/completion') {
      return handleCompletion(req.body);
    }

    return fail(404, NOT_FOUND_MESSAGE);
  }

  return { handle };
}
