// src/errors.ts: Error taxonomy and diagnosis for user-facing error messages
//
// GatewayError subclasses carry a stable `code` and the HTTP status a request
// failure maps to. diagnoseError() maps known error patterns to a
// human-readable diagnosis + suggestion for the CLI boundary.

import { logPath } from './paths.js';

// ═══════════════════════════════════════════════════════
// Error classes
// ═══════════════════════════════════════════════════════

export type GatewayErrorCode =
  | 'provider_unavailable'
  | 'generation_failed'
  | 'session_busy'
  | 'wire_malformed_request_line'
  | 'wire_invalid_encoding'
  | 'wire_no_body'
  | 'wire_body_too_large'
  | 'config_invalid';

export class GatewayError extends Error {
  constructor(
    readonly code: GatewayErrorCode,
    message: string,
    readonly status = 400,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The model is not ready: feature disabled, unsupported hardware, bridge missing. */
export class ProviderUnavailableError extends GatewayError {
  constructor(message = 'Foundation Models not available', options?: { cause?: unknown }) {
    super('provider_unavailable', message, 503, options);
  }
}

export class GenerationFailedError extends GatewayError {
  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super('generation_failed', reason, 400, options);
  }
}

/** The session queue is full. */
export class SessionBusyError extends GatewayError {
  constructor(readonly queued: number) {
    super('session_busy', `Session busy: ${queued} requests already waiting`, 503);
  }
}

export type WireErrorKind = 'MalformedRequestLine' | 'InvalidEncoding' | 'NoBody' | 'BodyTooLarge';

const WIRE_ERRORS: Record<WireErrorKind, { code: GatewayErrorCode; message: string; status: number }> = {
  MalformedRequestLine: { code: 'wire_malformed_request_line', message: 'Invalid HTTP request line', status: 400 },
  InvalidEncoding:      { code: 'wire_invalid_encoding',       message: 'Invalid request data',      status: 400 },
  NoBody:               { code: 'wire_no_body',                message: 'No request body',           status: 400 },
  BodyTooLarge:         { code: 'wire_body_too_large',         message: 'Request body too large',    status: 413 },
};

export class WireError extends GatewayError {
  constructor(readonly kind: WireErrorKind) {
    const { code, message, status } = WIRE_ERRORS[kind];
    super(code, message, status);
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config_invalid', message, 500, options);
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : String(err);
}

// ═══════════════════════════════════════════════════════
// Diagnosis
// ═══════════════════════════════════════════════════════

export interface DiagnosedError {
  /** Raw error message */
  raw: string;
  /** Human-readable diagnosis */
  diagnosis: string;
  /** Actionable suggestion */
  suggestion: string;
  /** Path hint to full logs */
  logHint: string;
}

interface ErrorPattern {
  test: RegExp;
  diagnosis: string;
  suggestion: string;
}

const PATTERNS: ErrorPattern[] = [
  {
    test: /foundation models not available|provider unavailable|model (is )?not available/i,
    diagnosis: 'The on-device model is not available',
    suggestion: 'Check macOS 26+ (sw_vers) and enable Apple Intelligence in System Settings',
  },
  {
    test: /spawn .* ENOENT|bridge (exited|not found)/i,
    diagnosis: 'The Foundation Models bridge could not be started',
    suggestion: 'Check providers.apple.bridge_command in fmgw.yaml points at the compiled bridge',
  },
  {
    test: /EADDRINUSE/i,
    diagnosis: 'Port already in use',
    suggestion: 'Stop the other process or pick another port with --port',
  },
  {
    test: /EACCES/i,
    diagnosis: 'Permission denied binding or reading a file',
    suggestion: 'Use a port above 1024 and check file permissions under ~/.fmgw',
  },
  {
    test: /ECONNREFUSED/i,
    diagnosis: 'Connection refused: nothing is listening at the target address',
    suggestion: 'Is the gateway running? Start it with: fmgw serve',
  },
  {
    test: /ETIMEDOUT/i,
    diagnosis: 'Network timeout: could not reach the model endpoint',
    suggestion: 'Check providers.openai.base_url and that the endpoint is up',
  },
  {
    test: /ECONNRESET|EPIPE|socket hang up/i,
    diagnosis: 'Connection closed unexpectedly',
    suggestion: 'The gateway may have crashed, check logs',
  },
  {
    test: /\b401\b|unauthorized|invalid api key/i,
    diagnosis: 'Authentication failed: API key is missing or wrong',
    suggestion: 'Set OPENAI_API_KEY in ~/.fmgw/.env',
  },
  {
    test: /config|fmgw\.yaml/i,
    diagnosis: 'Configuration is invalid',
    suggestion: 'Fix the reported key in fmgw.yaml',
  },
];

function getLogHint(): string {
  return `Details: ${logPath()}`;
}

export function diagnoseError(err: Error | string): DiagnosedError {
  const raw = typeof err === 'string' ? err : err.message;
  const logHint = getLogHint();

  for (const pattern of PATTERNS) {
    if (pattern.test.test(raw)) {
      return {
        raw,
        diagnosis: pattern.diagnosis,
        suggestion: pattern.suggestion,
        logHint,
      };
    }
  }

  return {
    raw,
    diagnosis: 'Unexpected error',
    suggestion: 'See log file for details',
    logHint,
  };
}

/** Multi-line rendering for the CLI. */
export function formatDiagnosedError(d: DiagnosedError): string {
  return `${d.diagnosis}: ${d.raw}\n${d.suggestion}\n${d.logHint}`;
}
