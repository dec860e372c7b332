import Fastify from 'fastify';

import {
  loadConfig,
  FileArtifactStore,
  earningsPlugin,
} from './infrastructure/index.js';
import { earningsRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the read-only query API.
 *
 * Order:
 * 1) Config (warnings logged, never fatal)
 * 2) Artifact store plugin
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const { config, warnings } = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  for (const warning of warnings) {
    fastify.log.warn({ variable: warning.variable }, warning.message);
  }

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(earningsPlugin, {
    store: new FileArtifactStore(config.outputDir),
    ttlHours: config.ttlHours,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(earningsRoutes);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  const shutdown = (): void => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
