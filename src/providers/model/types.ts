import type { Config } from '../../types.js';

/** Generation knobs forwarded verbatim. Absent keys mean provider defaults. */
export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Opaque conversational state owned by a provider. The gateway never looks
 * inside; `id` exists for logs and for tests that check session identity.
 */
export interface SessionHandle {
  readonly id: string;
}

export interface ModelProvider {
  name: string;
  /** False when the model cannot serve (feature disabled, unsupported hardware, endpoint down). */
  isAvailable(): Promise<boolean>;
  createSession(): Promise<SessionHandle>;
  respond(session: SessionHandle, prompt: string, options: GenerationOptions): Promise<string>;
  disposeSession?(session: SessionHandle): Promise<void>;
  /** Release process-level resources (child processes, sockets). */
  close?(): Promise<void>;
}

export interface ProviderModule {
  create(config: Config): Promise<ModelProvider>;
}
