/**
 * fmgw server: loopback HTTP listener in front of the completion gateway.
 *
 * One request per connection: read, parse, dispatch, write, close. Replies
 * are fully buffered. Connections are accepted concurrently; the gateway's
 * session lock serializes the generations behind them.
 */

import { createServer as createHttpServer, type Server as HttpServer } from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { randomUUID } from 'node:crypto';
import type { Config } from '../types.js';
import type { ModelProvider } from '../providers/model/types.js';
import { CompletionGateway } from '../gateway.js';
import { loadModelProvider } from './registry.js';
import { createDispatcher } from './dispatcher.js';
import { parseRequest } from './wire.js';
import { sendEmpty, sendError, sendJson, writeRawError } from './server-http.js';
import { GatewayError, errorMessage } from '../errors.js';
import { getLogger, type Logger } from '../logger.js';

// =====================================================
// Types
// =====================================================

export interface ServerOptions {
  /** Use this provider instead of the one named in config (tests, embedding). */
  provider?: ModelProvider;
  logger?: Logger;
}

export interface FmgwServer {
  readonly listening: boolean;
  /** Bound port once started; the configured port before. */
  readonly port: number;
  readonly host: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

// Parser error codes that mean the request line itself was unusable.
const REQUEST_LINE_ERRORS = new Set([
  'HPE_INVALID_METHOD',
  'HPE_INVALID_URL',
  'HPE_INVALID_VERSION',
  'HPE_INVALID_CONSTANT',
]);

function parserErrorCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : undefined;
}

// =====================================================
// Server Factory
// =====================================================

/**
 * Load the provider, open the gateway session and wire the HTTP handler.
 * Throws ProviderUnavailableError when the model cannot serve.
 */
export async function createServer(config: Config, opts: ServerOptions = {}): Promise<FmgwServer> {
  const logger = opts.logger ?? getLogger();

  const provider = opts.provider ?? await loadModelProvider(config);
  logger.info('provider_loaded', { provider: provider.name });

  let gateway: CompletionGateway;
  try {
    gateway = await CompletionGateway.create(provider, {
      maxQueue: config.session.max_queue,
      logger: logger.child({ component: 'gateway' }),
    });
  } catch (err) {
    await provider.close?.();
    throw err;
  }

  const dispatcher = createDispatcher(gateway, {
    errorStatus: config.server.error_status,
    logger: logger.child({ component: 'dispatcher' }),
  });

  const maxBodyBytes = config.server.max_body_bytes;
  let httpServer: HttpServer | null = null;
  let listening = false;
  let boundPort = config.server.port;
  let closed = false;

  // --- Request Handler ---

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = Date.now();
    const reqLogger = logger.child({ reqId: randomUUID().slice(0, 8) });

    let status: number;
    try {
      const parsed = await parseRequest(req, maxBodyBytes);
      const result = await dispatcher.handle(parsed);
      status = result.status;
      if (result.body) {
        sendJson(res, result.status, result.body);
      } else {
        sendEmpty(res, result.status);
      }
    } catch (err) {
      status = err instanceof GatewayError ? err.status : 500;
      const message = err instanceof GatewayError ? err.message : 'Internal server error';
      reqLogger.warn('request_failed', { error: errorMessage(err) });
      if (!res.headersSent) {
        sendError(res, status, message);
      } else {
        res.destroy();
      }
    }

    reqLogger.info('request', {
      method: req.method,
      path: req.url,
      status,
      durationMs: Date.now() - started,
    });
  }

  function handleClientError(err: Error, socket: Duplex): void {
    const code = parserErrorCode(err);
    if (code === 'ECONNRESET' || !socket.writable) {
      socket.destroy();
      return;
    }
    logger.debug('client_error', { code, error: err.message });
    if (code === 'HPE_HEADER_OVERFLOW') {
      writeRawError(socket, 431, 'Request headers too large');
    } else if (code !== undefined && REQUEST_LINE_ERRORS.has(code)) {
      writeRawError(socket, 400, 'Invalid HTTP request line');
    } else {
      writeRawError(socket, 400, 'Invalid HTTP request');
    }
  }

  // --- Lifecycle ---

  async function start(): Promise<void> {
    const server = createHttpServer((req, res) => {
      handleRequest(req, res).catch((err: unknown) => {
        logger.error('request_handler_crashed', { error: errorMessage(err) });
        res.destroy();
      });
    });
    server.on('clientError', handleClientError);

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.server.port, config.server.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address && typeof address === 'object') {
      boundPort = address.port;
    }
    httpServer = server;
    listening = true;

    logger.info('server_listening', {
      url: `http://${config.server.host}:${boundPort}`,
      provider: provider.name,
    });
    logger.info('endpoints', { completion: 'POST /completion', reset: 'POST /reset' });
  }

  async function stop(): Promise<void> {
    const server = httpServer;
    httpServer = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      });
    }
    if (listening) {
      listening = false;
      logger.info('server_stopped');
    }
    if (!closed) {
      closed = true;
      await gateway.close();
    }
  }

  return {
    get listening() { return listening; },
    get port() { return boundPort; },
    get host() { return config.server.host; },
    start,
    stop,
  };
}
