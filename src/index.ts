// src/index.ts
import { loadConfig, Config } from './config.js';
import { configureLogger, parseLogLevel, info, error } from './utils/logger.js';
import { initServices, closeServices, ServiceContainer } from './services/index.js';
import { CommandRouter } from './router/index.js';
import { BotServer } from './server/index.js';
import { startRepl } from './repl.js';

async function main(): Promise<void> {
  // 1. Load config
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    console.error('Failed to load config:', err);
    process.exit(1);
  }

  // 2. Configure logging
  configureLogger({
    level: parseLogLevel(config.logging.level),
    file: config.logging.file,
    console: config.logging.console,
  });

  info('Weather bot starting...');

  // 3. Initialize services
  let services: ServiceContainer;
  try {
    services = await initServices(config);
  } catch (err) {
    error('Failed to initialize services', { error: String(err) });
    process.exit(1);
  }

  // 4. Create router
  const router = new CommandRouter(services);
  await router.initialize();

  // 5. Start HTTP transport
  const server = config.server.enabled ? new BotServer(services, router) : null;
  if (server) {
    await server.start(config.server.port, config.server.host);
  }

  // 6. Handle shutdown
  const shutdown = async () => {
    info('Shutting down...');
    try {
      await server?.stop();
    } catch (err) {
      error('Server did not close cleanly', { error: String(err) });
    }
    closeServices(services);
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);

  // 7. Start REPL
  if (config.repl.enabled) {
    await startRepl(router, services);
  } else if (!server) {
    error('Nothing to run: enable SERVER_ENABLED or REPL_ENABLED');
    closeServices(services);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
