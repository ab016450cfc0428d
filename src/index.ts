import { loadConfig } from './infrastructure/index.js';
import { buildAdminServer, buildEdgeServer } from './servers.js';

/**
 * Starts the public edge and the admin listener.
 *
 * Order:
 * 1) Configuration (fails fast on bad env)
 * 2) Edge server: Redis + capture routes
 * 3) Admin server: database + item routes
 * 4) Shutdown hooks
 * 5) listen() on both
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const edge = await buildEdgeServer(config);
  const admin = await buildAdminServer(config);

  // --------------------------------------------------
  // Shutdown: stop accepting, let plugins close their connections
  // --------------------------------------------------

  const close = (signal: NodeJS.Signals): void => {
    edge.log.info({ signal }, 'Shutting down');
    Promise.all([edge.close(), admin.close()]).then(
      () => process.exit(0),
      (err: unknown) => {
        edge.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', close);
  process.once('SIGTERM', close);

  await edge.listen({ host: config.host, port: config.port });
  await admin.listen({ host: config.adminHost, port: config.adminPort });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
