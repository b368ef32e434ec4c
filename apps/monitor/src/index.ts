/**
 * Monitor entry point: probes targets, redeploys them when they go down,
 * and serves the HTTP API
 */

import { createLogger, getEnv, loadConfig, parseLogLevel, setLogLevel } from '@lazarus/core';
import { MonitorMetrics } from './metrics/registry.js';
import { Monitor } from './monitor.js';
import { NotifierHub, SseSink, TelegramSink, WebhookSink } from './notifier/index.js';
import { createProviderClients } from './providers/index.js';
import { buildServer } from './server.js';
import { createStore } from './store/index.js';

const logger = createLogger('monitor');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(parseLogLevel(getEnv().LOG_LEVEL));

  const store = createStore(config.store);
  const metrics = new MonitorMetrics({ collectDefaults: true });

  const sse = new SseSink();
  const notifier = new NotifierHub({ sinks: [sse] });
  if (config.notify.webhookUrl) {
    notifier.addSink(new WebhookSink({ url: config.notify.webhookUrl }));
  }
  if (config.notify.telegram) {
    notifier.addSink(new TelegramSink(config.notify.telegram));
  }
  logger.info(`Notification sinks: ${notifier.sinkNames.join(', ')}`);

  const monitor = new Monitor({
    store,
    providers: createProviderClients(config.providers),
    notifier,
    metrics,
    poolSize: config.scheduler.poolSize,
    tickMs: config.scheduler.tickMs,
    providerTimeoutMs: config.redeploy.providerTimeoutMs,
    historySize: config.redeploy.historySize,
  });

  const server = await buildServer({
    monitor,
    metrics,
    sse,
    adminApiKeys: config.adminApiKeys,
  });

  await monitor.start();

  const { host, port } = config.monitor;
  try {
    await server.listen({ port, host });
    logger.info(`Monitor listening on ${host}:${port}`);
  } catch (err) {
    logger.error('Failed to start server', err instanceof Error ? err : undefined);
    await monitor.stop(config.scheduler.shutdownTimeoutMs);
    await store.close();
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    const drained = await monitor.stop(config.scheduler.shutdownTimeoutMs);
    if (!drained) {
      logger.warn('Shutdown deadline reached with work still in flight');
    }
    await notifier.flush();
    await server.close();
    await store.close();
    process.exit(drained ? 0 : 1);
  };

  const onSignal = (signal: string): void => {
    void shutdown(signal).catch((err: unknown) => {
      logger.error('Error during shutdown', err instanceof Error ? err : undefined);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  logger.error('Unhandled error', err instanceof Error ? err : undefined);
  process.exit(1);
});
