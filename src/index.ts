import 'dotenv/config';
import { createApp, createServices } from './app';
import { loadConfig } from './config';
import { openDatabase } from './db';
import { createLogger, setLogLevel } from './logger';

const log = createLogger('server');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const db = openDatabase(config.dataDir);
  const services = createServices(config, db);
  services.scheduler.rebuild();

  const app = createApp(services);
  const server = app.listen(config.port, () => {
    log.info(`listening http://localhost:${config.port}`);
  });

  await services.accounts.loginAll();
  services.loop.start();

  const shutdown = async (signal: string) => {
    log.info(`${signal} received, shutting down`);
    await services.loop.stop();
    server.close();
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.error('startup failed', err);
  process.exit(1);
});
