import { envDebug } from '@admissions/config';
import { createLogger } from '@admissions/observability';
import { createApp } from './app';
import { loadEnv } from './config';
import { createContainer } from './container';

envDebug('admissions-bot');

const log = createLogger('admissions-bot');

const env = loadEnv();
const container = createContainer(env);
const app = createApp(container);

container.scheduler.start();

const server = app.listen(env.PORT, () => {
  log.info(`admissions-bot listening on http://localhost:${env.PORT}`);
  container.poller.start();
});

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  log.info({ signal }, 'Shutting down');

  container.poller.stop();
  container.scheduler.stop();
  server.close();
  await container.dispatcher.drain();
  await container.store.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
