#!/usr/bin/env node
import 'dotenv/config';

import { attachConsole, CommandSurface, ConsoleHandle } from './commands/commandSurface';
import { loadConfig } from './config';
import { loadHookModules } from './hookModules';
import { HookService } from './hookService';
import { logger } from './logger';
import { MetricsServerHandle, startMetricsServer } from './metrics';

const bootstrap = async () => {
  const config = loadConfig();
  const service = new HookService({
    defaultMaxRetries: config.defaultMaxRetries,
    defaultRetryDelaySeconds: config.defaultRetryDelaySeconds,
    handlerTimeoutMs: config.handlerTimeoutMs,
    cleanupMaxAgeSeconds: config.cleanupMaxAgeSeconds,
  });

  await loadHookModules(service, config.hookModules);
  service.initialize();

  let metricsServer: MetricsServerHandle | undefined;
  if (config.metricsPort !== undefined) {
    metricsServer = await startMetricsServer(config.metricsPort, {
      health: () => {
        const stats = service.getStats();
        return { hooks: stats.totalHooks, scheduledActions: stats.scheduledActionCount };
      },
    });
  }

  let consoleHandle: ConsoleHandle | undefined;
  if (config.consoleEnabled) {
    consoleHandle = attachConsole(new CommandSurface(service), process.stdin, process.stdout);
  }

  const shutdown = async () => {
    logger.info('Shutting down hook orchestrator');
    consoleHandle?.close();
    service.stop();
    await metricsServer?.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

bootstrap().catch((error) => {
  logger.error({ error }, 'Failed to start hook orchestrator');
  process.exit(1);
});
