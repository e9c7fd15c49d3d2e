/**
 * Webhook receiver entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  // The app opens the store on ready and closes it on close
  const app = buildApp({ storeConfig: env });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    app.log.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    console.log('═══════════════════════════════════════════════════════════════');
    console.log(`  ✅ Webhook receiver started on port ${env.PORT}`);
    console.log('═══════════════════════════════════════════════════════════════');
    console.log('');
    console.log('📦 Available Endpoints:');
    console.log('  GET  /');
    console.log('  GET  /health');
    console.log('  POST /webhook');
    console.log('  GET  /api/observations/latest');
    console.log('  GET  /api/observations/latest.csv');
    console.log('  GET  /api/observations/summary');
    console.log('  GET  /api/observations?limit=N');
  } catch (err) {
    app.log.error(err);
    await app.close();
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
