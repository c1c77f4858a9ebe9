// env-loader 必须最先导入：config 在模块加载时读取 process.env
import { loadedEnvFiles } from './core/env-loader';
import { config } from './core/config';
import { validateConfigWithSchema } from './core/config-schema';
import { createModuleLogger, isLogLevel, setLogLevel } from './core/logger';
import { closeMessagingContext, createMessagingContext } from './platform/messaging-context';
import { gracefulShutdown } from './platform/middleware/gracefulShutdown';
import { metricsCollector } from './platform/middleware/metricsCollector';

const log = createModuleLogger('index');

async function startWorker(): Promise<void> {
  if (isLogLevel(config.app.logLevel)) {
    setLogLevel(config.app.logLevel);
  }
  if (loadedEnvFiles.length > 0) {
    log.debug(`Env files: ${loadedEnvFiles.join(', ')}`);
  }

  const validation = validateConfigWithSchema(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
  }

  metricsCollector.enableDefaultMetrics();
  const ctx = createMessagingContext({ config });

  gracefulShutdown.configure({ timeout: config.shutdown.timeoutMs });
  gracefulShutdown.addHook('messaging', () => closeMessagingContext(ctx), 10);
  gracefulShutdown.registerSignalHandlers();

  await ctx.eventBus.start(config.eventBus.consumerName);

  const breakerHealth = ctx.breakers.getHealthStatus();
  log.info(
    { consumer: ctx.eventBus.getConsumerName(), breakers: breakerHealth.totalServices },
    `${config.app.name} worker started (${config.app.env})`,
  );
}

startWorker().catch((err: unknown) => {
  log.fatal('Worker failed to start:', err);
  process.exit(1);
});
