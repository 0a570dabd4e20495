/**
 * Server entry point
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const app = buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err: unknown) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
