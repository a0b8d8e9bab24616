import { Logger, TallyAgent, describeError, setupSignalHandlers } from '@inputtally/core';
import { StatsClient } from '@inputtally/sdk';
import { loadConfig } from './config';
import { EvdevInputSource } from './evdev';
import { createHealthServer } from './health';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logging.level, { service: 'inputtally-agent' });

  logger.info('Starting inputtally agent', {
    apiUrl: config.api.url,
    devices: config.input.devices,
    flushIntervalMs: config.delivery.flushIntervalMs,
  });

  const client = new StatsClient({
    baseUrl: config.api.url,
    secret: config.api.secret,
    timeoutMs: config.api.timeoutMs,
  });

  const agent = new TallyAgent({
    source: new EvdevInputSource(config.input.devices),
    transport: client,
    spoolPath: config.spool.path,
    flushIntervalMs: config.delivery.flushIntervalMs,
    logger: logger.child({ component: 'spool' }),
  });

  // Wire agent events to logger
  agent.on('started', () => logger.info('Agent started'));
  agent.on('stopped', () => logger.info('Agent stopped'));
  agent.on('restored', (backup) => logger.info('Resumed from spool', { totals: backup }));
  agent.on('flush', (stats) => logger.info('Stats delivered', stats));
  agent.on('error', (err) => logger.error('Agent error', describeError(err)));
  agent.on('warn', (detail) => logger.warn('Agent warning', { detail }));

  // Health server
  let healthServer: ReturnType<typeof createHealthServer> | undefined;
  if (config.health.enabled) {
    healthServer = createHealthServer({ port: config.health.port, agent });
    logger.info('Health server listening', { port: config.health.port });
  }

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await agent.stop();
    const server = healthServer;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    logger.info('Shutdown complete');
  };

  const detach = setupSignalHandlers({ logger, onShutdown: shutdown });

  // Devices gone: deliver or spool what was counted, then exit
  agent.on('captureEnded', () => {
    logger.error('Input source ended unexpectedly');
    detach();
    shutdown().then(
      () => process.exit(1),
      (err: unknown) => {
        logger.error('Error during shutdown', describeError(err));
        process.exit(1);
      },
    );
  });

  await agent.start();
  logger.info('Agent is running');
}

main().catch((err: unknown) => {
  new Logger('error').error('Fatal error', describeError(err));
  process.exit(1);
});
