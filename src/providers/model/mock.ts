import { randomUUID } from 'node:crypto';
import type { ModelProvider, SessionHandle, GenerationOptions } from './types.js';
import type { Config } from '../../types.js';

interface MockSession extends SessionHandle {
  turns: number;
}

export async function create(config: Config): Promise<ModelProvider> {
  const sessions = new Map<string, MockSession>();
  const fixedReply = config.providers.mock.reply;

  return {
    name: 'mock',

    async isAvailable(): Promise<boolean> {
      return true;
    },

    async createSession(): Promise<SessionHandle> {
      const session: MockSession = { id: randomUUID(), turns: 0 };
      sessions.set(session.id, session);
      return { id: session.id };
    },

    async respond(handle: SessionHandle, prompt: string, _options: GenerationOptions): Promise<string> {
      const session = sessions.get(handle.id);
      if (!session) {
        throw new Error(`Unknown session ${handle.id}`);
      }
      session.turns += 1;

      if (fixedReply !== undefined) return fixedReply;

      // Simple canned responses for testing
      if (prompt.includes('remember')) {
        return 'I will remember that for you.';
      }
      if (session.turns > 1) {
        return `Turn ${session.turns} of this conversation.`;
      }
      return 'Hello from mock model.';
    },

    async disposeSession(handle: SessionHandle): Promise<void> {
      sessions.delete(handle.id);
    },
  };
}
