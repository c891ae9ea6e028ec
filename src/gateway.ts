/**
 * Completion gateway: owns the single conversation session.
 *
 * The session handle never leaves this class. generate() and reset() both
 * run under a FIFO lock, so at most one generation is in flight and a reset
 * waits for the generation ahead of it.
 */

import type { ModelProvider, SessionHandle, GenerationOptions } from './providers/model/types.js';
import { SessionLock } from './utils/session-lock.js';
import { GenerationFailedError, ProviderUnavailableError, errorMessage } from './errors.js';
import { getLogger, type Logger } from './logger.js';

export interface GatewayOptions {
  /** Callers allowed to wait behind the in-flight one. Default: unbounded. */
  maxQueue?: number;
  logger?: Logger;
}

/** "System: …\n\nUser: …" when a system prompt is given, else the prompt unchanged. */
export function buildPrompt(prompt: string, systemPrompt?: string): string {
  if (systemPrompt === undefined) return prompt;
  return `System: ${systemPrompt}\n\nUser: ${prompt}`;
}

export function buildOptions(temperature?: number, maxTokens?: number): GenerationOptions {
  const options: GenerationOptions = {};
  if (temperature !== undefined) options.temperature = temperature;
  if (maxTokens !== undefined) options.maxTokens = maxTokens;
  return options;
}

export class CompletionGateway {
  private readonly lock: SessionLock;
  private readonly logger: Logger;
  private generation = 1;

  private constructor(
    private readonly provider: ModelProvider,
    private session: SessionHandle,
    opts: GatewayOptions,
  ) {
    this.lock = new SessionLock(opts.maxQueue);
    this.logger = opts.logger ?? getLogger().child({ component: 'gateway' });
  }

  /**
   * Check the provider and open the first session.
   * Throws ProviderUnavailableError when the model cannot serve.
   */
  static async create(provider: ModelProvider, opts: GatewayOptions = {}): Promise<CompletionGateway> {
    if (!(await provider.isAvailable())) {
      throw new ProviderUnavailableError();
    }
    const session = await provider.createSession();
    const gateway = new CompletionGateway(provider, session, opts);
    gateway.logger.info('session_created', { provider: provider.name, session: gateway.sessionId });
    return gateway;
  }

  /** Gateway-assigned number of the current session; bumps on every reset. */
  get sessionId(): number {
    return this.generation;
  }

  async generate(
    prompt: string,
    systemPrompt?: string,
    temperature?: number,
    maxTokens?: number,
  ): Promise<string> {
    const fullPrompt = buildPrompt(prompt, systemPrompt);
    const options = buildOptions(temperature, maxTokens);

    return this.lock.run(async () => {
      let text: unknown;
      try {
        text = await this.provider.respond(this.session, fullPrompt, options);
      } catch (err) {
        if (err instanceof ProviderUnavailableError) throw err;
        if (!(await this.stillAvailable())) {
          throw new ProviderUnavailableError(undefined, { cause: err });
        }
        throw new GenerationFailedError(errorMessage(err), { cause: err });
      }

      if (typeof text !== 'string' || text.length === 0) {
        throw new GenerationFailedError('Model returned an empty response');
      }
      return text;
    });
  }

  /**
   * Drop the conversation and start a fresh one. Waits behind queued
   * generations but is never turned away by the queue bound.
   */
  async reset(): Promise<void> {
    await this.lock.run(async () => {
      const previous = this.session;
      this.session = await this.provider.createSession();
      this.generation += 1;
      await this.dispose(previous);
      this.logger.info('session_reset', { session: this.generation });
    }, { bounded: false });
  }

  /** Dispose the session and the provider. */
  async close(): Promise<void> {
    await this.lock.run(async () => {
      await this.dispose(this.session);
      await this.provider.close?.();
    }, { bounded: false });
  }

  private async dispose(session: SessionHandle): Promise<void> {
    if (!this.provider.disposeSession) return;
    try {
      await this.provider.disposeSession(session);
    } catch (err) {
      this.logger.warn('session_dispose_failed', { error: errorMessage(err) });
    }
  }

  private async stillAvailable(): Promise<boolean> {
    try {
      return await this.provider.isAvailable();
    } catch {
      return false;
    }
  }
}
