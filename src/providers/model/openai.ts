import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { randomUUID } from 'node:crypto';
import type { ModelProvider, SessionHandle, GenerationOptions } from './types.js';
import type { Config } from '../../types.js';
import { getLogger } from '../../logger.js';
import { errorMessage } from '../../errors.js';

const logger = getLogger().child({ component: 'openai-compat' });

/** The slice of the OpenAI client this provider uses. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: ChatCompletionMessageParam[];
        temperature?: number;
        max_tokens?: number;
      }): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
  models: {
    list(): PromiseLike<unknown>;
  };
}

function apiKey(): string {
  // Local OpenAI-compatible servers ignore the key but the client requires one.
  return process.env.FMGW_OPENAI_API_KEY ?? process.env.OPENAI_API_KEY ?? 'not-needed';
}

/**
 * Chat-completions backed provider. The endpoint is stateless, so the
 * session is the message history kept here and replayed on every call.
 */
export function createOpenAIProvider(client: ChatClient, model: string): ModelProvider {
  const histories = new Map<string, ChatCompletionMessageParam[]>();

  return {
    name: 'openai',

    async isAvailable(): Promise<boolean> {
      try {
        await client.models.list();
        return true;
      } catch (err) {
        logger.warn('availability_check_failed', { error: errorMessage(err) });
        return false;
      }
    },

    async createSession(): Promise<SessionHandle> {
      const id = randomUUID();
      histories.set(id, []);
      return { id };
    },

    async respond(session: SessionHandle, prompt: string, options: GenerationOptions): Promise<string> {
      const history = histories.get(session.id);
      if (!history) {
        throw new Error(`Unknown session ${session.id}`);
      }

      const userTurn: ChatCompletionMessageParam = { role: 'user', content: prompt };
      const completion = await client.chat.completions.create({
        model,
        messages: [...history, userTurn],
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
      });

      const text = completion.choices[0]?.message.content ?? '';
      if (text.length === 0) {
        throw new Error('Model returned an empty response');
      }
      // History only grows on success so a failed turn leaves the session as it was.
      history.push(userTurn, { role: 'assistant', content: text });
      return text;
    },

    async disposeSession(session: SessionHandle): Promise<void> {
      histories.delete(session.id);
    },
  };
}

export async function create(config: Config): Promise<ModelProvider> {
  const { base_url: baseURL, model } = config.providers.openai;
  logger.debug('init', { baseURL, model });
  return createOpenAIProvider(new OpenAI({ apiKey: apiKey(), baseURL }), model);
}
