// src/cli/index.ts
import { readFileSync } from 'node:fs';
import { loadDotEnv } from '../dotenv.js';

// ═══════════════════════════════════════════════════════
// Command Router (also used by tests)
// ═══════════════════════════════════════════════════════

export interface CommandHandlers {
  serve?: (args: string[]) => Promise<void>;
  send?: (args: string[]) => Promise<void>;
  reset?: (args: string[]) => Promise<void>;
  help?: () => Promise<void>;
}

export const KNOWN_COMMANDS = new Set(['serve', 'send', 'reset', 'help']);

export async function routeCommand(
  args: string[],
  handlers: CommandHandlers,
): Promise<void> {
  const command = args[0] || 'serve';
  const rest = args.slice(1);

  switch (command) {
    case 'serve':
      if (handlers.serve) await handlers.serve(rest);
      break;
    case 'send':
      if (handlers.send) await handlers.send(rest);
      break;
    case 'reset':
      if (handlers.reset) await handlers.reset(rest);
      break;
    default:
      if (handlers.help) await handlers.help();
      break;
  }
}

export function showHelp(): void {
  console.log(`
fmgw - Local HTTP gateway for the on-device language model

Usage:
  fmgw serve [options]     Start the gateway (default)
  fmgw send <prompt>       Send one completion request
  fmgw reset               Reset the conversation session

Serve Options:
  --config, -c <path>      Config file path (default: ~/.fmgw/fmgw.yaml)
  --port <n>               Listen port (default: 8080)
  --host <addr>            Bind address (default: 127.0.0.1)
  --verbose                Debug logging on the console

Send Options:
  --system, -s <text>      System prompt
  --temperature, -t <n>    Sampling temperature
  --max-tokens <n>         Maximum response tokens
  --stdin, -               Read the prompt from stdin
  --json                   Print the raw JSON reply
  --url <base>             Gateway URL (default: http://127.0.0.1:8080)

Examples:
  fmgw serve --port 9090
  fmgw send "what is the capital of France"
  fmgw send -s "Answer in one word" -t 0 "capital of France?"
  fmgw reset
  `);
}

// ═══════════════════════════════════════════════════════
// Serve
// ═══════════════════════════════════════════════════════

export interface ServeArgs {
  configPath?: string;
  port?: number;
  host?: string;
  verbose: boolean;
}

export function parseServeArgs(args: string[]): ServeArgs {
  const out: ServeArgs = { verbose: false };
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--config' || args[i] === '-c') {
      out.configPath = args[++i];
    } else if (args[i] === '--port' || args[i] === '-p') {
      const port = Number(args[++i]);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`--port expects a port number, got "${args[i]}"`);
      }
      out.port = port;
    } else if (args[i] === '--host') {
      out.host = args[++i];
    } else if (args[i] === '--verbose') {
      out.verbose = true;
    }
  }
  return out;
}

async function runServe(args: string[]): Promise<void> {
  const opts = parseServeArgs(args);

  const { loadConfig } = await import('../config.js');
  const { initLogger } = await import('../logger.js');
  const { createServer } = await import('../host/server.js');

  const config = loadConfig(opts.configPath);
  if (opts.port !== undefined) config.server.port = opts.port;
  if (opts.host !== undefined) config.server.host = opts.host;

  const logger = initLogger({ level: opts.verbose ? 'debug' : config.log_level });
  logger.info('starting', { provider: config.provider });

  const server = await createServer(config, { logger });
  await server.start();

  const shutdown = (signal: string) => {
    logger.info('shutdown', { signal });
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown_failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

function readVersion(): string {
  const pkgUrl = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(pkgUrl, 'utf-8'));
  const version: unknown = pkg && typeof pkg === 'object' ? Reflect.get(pkg, 'version') : undefined;
  return typeof version === 'string' ? version : 'unknown';
}

// ═══════════════════════════════════════════════════════
// Main Entry Point
// ═══════════════════════════════════════════════════════

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  loadDotEnv();

  if (argv.includes('--help') || argv.includes('-h')) {
    showHelp();
    return;
  }

  if (argv.includes('--version') || argv.includes('-v')) {
    console.log(`fmgw ${readVersion()}`);
    return;
  }

  // Flags before any command belong to `serve`.
  const routed = argv.length > 0 && KNOWN_COMMANDS.has(argv[0]) ? argv : ['serve', ...argv];

  await routeCommand(routed, {
    serve: runServe,
    send: async (sendArgs) => {
      const { runSend } = await import('./send.js');
      await runSend(sendArgs);
    },
    reset: async (resetArgs) => {
      const { runReset } = await import('./send.js');
      await runReset(resetArgs);
    },
    help: async () => {
      showHelp();
    },
  });
}
