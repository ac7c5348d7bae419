import { createApp } from './app.js';
import { loadConfig } from './config/config.js';
import { createServices } from './services/index.js';
import { errorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Server');

const startServer = async () => {
  const config = loadConfig();
  const services = createServices(config);

  const loaded = services.definitions.loadFromFile(config.pipelines.file);
  logger.info(`Loaded ${loaded.length} pipelines from ${config.pipelines.file}`);
  services.scheduler.initialize();

  const app = createApp(config, services);
  const server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`);
  });

  let shuttingDown = false;
  const cleanup = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Received shutdown signal. Cleaning up...');
    server.close();
    await services.shutdown();
    process.exit(0);
  };

  const onSignal = () => {
    cleanup().catch(error => {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
};

startServer().catch(error => {
  logger.error(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
