import mongoose from 'mongoose';
import { Logger, describeError, setupSignalHandlers } from '@inputtally/core';
import { MongoStatsStore } from '@inputtally/provider-mongo';
import { loadConfig } from './config';
import { createApiServer, listen, closeServer } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logging.level, { service: config.service.name });

  logger.info('Starting inputtally server', {
    host: config.http.host,
    port: config.http.port,
    eventsCollection: config.mongodb.eventsCollection,
  });

  // Connect to MongoDB
  await mongoose.connect(config.mongodb.uri);
  logger.info('Connected to MongoDB');

  const store = new MongoStatsStore({
    eventsCollection: config.mongodb.eventsCollection,
    metadataCollection: config.mongodb.metadataCollection,
  });
  await store.initialize();

  const server = createApiServer({
    store,
    apiSecret: config.auth.apiSecret,
    serviceName: config.service.name,
    corsAllowOrigin: config.http.corsAllowOrigin,
    maxBodyBytes: config.http.maxBodyBytes,
    logger,
  });

  // Signal handlers
  setupSignalHandlers({
    logger,
    onShutdown: async () => {
      logger.info('Shutting down...');
      await closeServer(server);
      await store.close();
      await mongoose.disconnect();
      logger.info('Shutdown complete');
    },
  });

  await listen(server, config.http.port, config.http.host);
  logger.info('Server listening', { host: config.http.host, port: config.http.port });
}

main().catch((err: unknown) => {
  new Logger('error').error('Fatal error', describeError(err));
  process.exit(1);
});
