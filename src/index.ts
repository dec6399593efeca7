import config from '@config';
import { buildServer } from '@api/http';
import { createPool } from '@db/index';
import { logger } from '@telemetry/index';
import { HostSampler, MetricsStore, MonitoringAnalytics, SystemCollector } from '@monitoring/index';

const bootstrap = async () => {
  const pool = createPool({ name: 'metrics-read', statementTimeoutMs: config.monitoring.readTimeoutMs });
  // One connection per queued API writer plus one for the collector.
  const writePool = createPool({
    name: 'metrics-write',
    statementTimeoutMs: config.monitoring.writeTimeoutMs,
    max: config.monitoring.writeConcurrency + 1,
  });
  const store = await MetricsStore.open(pool, {
    writer: writePool,
    writeTimeoutMs: config.monitoring.writeTimeoutMs,
    readTimeoutMs: config.monitoring.readTimeoutMs,
    trendBucketMs: config.monitoring.trendBucketMs,
    queueCapacity: config.monitoring.queueCapacity,
    writeConcurrency: config.monitoring.writeConcurrency,
    retentionDays: config.monitoring.retentionDays,
    compressAfterDays: config.monitoring.compressAfterDays,
  });
  const analytics = new MonitoringAnalytics(store);
  const collector = new SystemCollector(new HostSampler(config.monitoring.cpuSampleMs), store, {
    intervalMs: config.monitoring.sampleIntervalMs,
    diskMount: config.monitoring.diskMount,
  });
  const server = buildServer({
    store,
    analytics,
    monitoringToken: config.monitoring.token,
    instrumentation: { excludePaths: config.monitoring.excludePaths },
  });

  if (config.monitoring.enabled) {
    collector.start();
  } else {
    logger.warn('[monitoring] System collector disabled (METRICS_ENABLED=false)');
  }

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    collector.stop();
    await server.close();
    await store.flush();
    await Promise.all([pool.end(), writePool.end()]);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }

  await server.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ metricsMode: store.mode }, `Metrics service listening on port ${config.port}`);
};

bootstrap().catch((err) => {
  logger.error({ err }, 'Failed to start metrics service');
  process.exit(1);
});
