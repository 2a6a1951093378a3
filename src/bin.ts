#!/usr/bin/env node

import { serve } from '@hono/node-server';
import type { Http2Bindings, HttpBindings } from '@hono/node-server';
import { loadConfig } from './config.js';
import { createContainer, TRAFFIC_LOG_CHANNEL } from './container.js';
import { PinoLogProvider } from './providers/PinoLogProvider.js';
import { createApp } from './server.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

function clientAddressOf(env: HttpBindings | Http2Bindings): string | null {
  return env.incoming.socket.remoteAddress ?? null;
}

async function main(): Promise<void> {
  const config = loadConfig();

  const logProvider = PinoLogProvider.create({
    serviceName: config.serviceName,
    env: config.env,
    level: config.logLevel,
    pretty: config.env === 'development',
  });

  // Whitelist compiled here, before the server accepts connections
  const container = createContainer({
    config,
    logProvider,
    recordProvider: logProvider.channel(TRAFFIC_LOG_CHANNEL),
  });
  const app = createApp(container);

  const server = serve({
    fetch: (req: Request, env: HttpBindings | Http2Bindings) =>
      app(req, { clientAddress: clientAddressOf(env), rawHeaders: env.incoming.rawHeaders }),
    port: config.server.port,
    hostname: config.server.host,
  });

  logProvider.info(`listening on ${config.server.host}:${config.server.port}`, {
    whitePatterns: container.whitelist.size,
    logResp: config.trafficLog.logResp,
  });

  async function shutdown(signal: string): Promise<void> {
    logProvider.info(`${signal} received, shutting down`);

    const shutdownTimer = setTimeout(() => {
      logProvider.error('shutdown timeout, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    shutdownTimer.unref();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await logProvider.flush();
    process.exit(0);
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[traffic-log] failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
