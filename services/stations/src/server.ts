import process from 'node:process';

import { createApp, startIngestion } from './app';
import { loadServiceConfig } from './config/serviceConfig';

const start = async () => {
  const config = loadServiceConfig();
  const { app, ctx } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    await startIngestion(app, ctx);
    app.log.info(
      {
        port: config.port,
        host: config.host,
        replicationFactor: config.store.replicationFactor,
        writeRequiredAcks: config.quorum.write.requiredAcks,
        readRequiredAcks: config.quorum.read.requiredAcks
      },
      'Server started'
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start station service');
    await app.close().catch((closeError: unknown) => {
      app.log.error({ err: closeError }, 'Error while closing after failed start');
    });
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down station service');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught error in station service', error);
  process.exit(1);
});
