/**
 * Spur Demo Entry Point
 *
 * Boots the demo routes on Node's HTTP server.
 */

import { Application } from './framework/app.ts';
import { loadConfig } from './framework/config/config.ts';
import { Logger, setLogger } from './framework/telemetry/logger.ts';
import { registerRoutes } from './src/routes/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Configure logging
  const logger = new Logger({
    level: config.get('logLevel'),
    format: config.get('logFormat'),
    context: { service: config.get('telemetry').serviceName },
  });
  setLogger(logger);

  // 3. Create application and register routes
  const app = new Application({ config, logger });
  registerRoutes(app);

  // 4. Start server
  await app.listen();

  const shutdown = (): void => {
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Failed to start Spur:', error);
  process.exit(1);
});
