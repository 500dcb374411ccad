/**
 * start command - run the scheduler until a shutdown signal
 */

import { getConfigSummary } from '../config/index.js';
import type { Runtime } from '../container/index.js';

/**
 * Resolves with the signal name on the first SIGINT or SIGTERM.
 */
export function waitForShutdownSignal(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/**
 * @returns Whether the scheduler stopped cleanly
 */
export async function startCommand(
  runtime: Runtime,
  waitForShutdown: () => Promise<string> = waitForShutdownSignal
): Promise<boolean> {
  const { logger, scheduler } = runtime;
  const tasks = runtime.registerDefaultTasks();

  logger.info('Starting ETF Pulse scheduler', {
    ...getConfigSummary(runtime.config),
    operation: 'app_startup',
    tasks: tasks.map((task) => task.id),
  });
  scheduler.start();

  const signal = await waitForShutdown();
  logger.info('Shutting down', { signal });

  const clean = await runtime.shutdown();
  logger.info('Scheduler stopped', { clean });
  return clean;
}
