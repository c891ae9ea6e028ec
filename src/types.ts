// src/types.ts: Shared cross-cutting types
import type { ModelProviderName } from './host/provider-map.js';
import type { LogLevel } from './logger.js';

/** Body of POST /completion, after validation. */
export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Wire reply for every JSON endpoint. Exactly one of the two fields is meaningful. */
export interface CompletionResponse {
  response: string;
  error: string | null;
}

export interface Config {
  provider: ModelProviderName;
  log_level: LogLevel;
  server: {
    host: string;
    port: number;
    max_body_bytes: number;
    error_status: number;
  };
  session: {
    max_queue: number;
  };
  providers: {
    apple: {
      bridge_command: string[];
    };
    openai: {
      base_url: string;
      model: string;
    };
    mock: {
      reply?: string;
    };
  };
}
