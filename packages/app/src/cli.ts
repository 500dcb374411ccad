#!/usr/bin/env tsx

/**
 * CLI entry point for the etfpulse command
 */

// Load environment variables from .env file
import 'dotenv/config';

import chalk from 'chalk';
import { Command } from 'commander';
import { describeError, isConfigurationError } from '@etfpulse/contracts';
import { attachGlobalHandlers, createLogger, type Logger } from '@etfpulse/logger';
import { cacheCleanupCommand, cacheStatsCommand } from './commands/cache.command.js';
import { historyCommand } from './commands/history.command.js';
import { quoteCommand } from './commands/quote.command.js';
import { startCommand } from './commands/start.command.js';
import { statusCommand } from './commands/status.command.js';
import { loadConfig, type Config } from './config/index.js';
import { createRuntime, type Runtime } from './container/index.js';
import type { OutputFormat } from './formatters/console-formatter.js';

interface GlobalOptions {
  config?: string;
  json: boolean;
  verbose: boolean;
}

const program = new Command();

program
  .name('etfpulse')
  .description('Track ETF quotes, cache market data and run scheduled analysis')
  .version('0.1.0')
  .option('-c, --config <path>', 'JSON configuration file (overrides ETFPULSE_CONFIG)')
  .option('--json', 'Print machine-readable JSON', false)
  .option('-v, --verbose', 'Log at debug level', false);

function setup(): { config: Config; logger: Logger; options: GlobalOptions } {
  const options = program.opts<GlobalOptions>();
  const config = loadConfig({ configFile: options.config });
  const logger = createLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  return { config, logger, options };
}

/**
 * Build the runtime from configuration and run one command against it
 */
async function withRuntime(run: (runtime: Runtime, format: OutputFormat) => Promise<string>): Promise<void> {
  const { config, logger, options } = setup();
  const runtime = await createRuntime(config, logger);
  console.log(await run(runtime, options.json ? 'json' : 'text'));
}

program
  .command('start')
  .description('Run the scheduler until SIGINT or SIGTERM')
  .action(async () => {
    const { config, logger } = setup();
    const detach = attachGlobalHandlers(logger);
    const runtime = await createRuntime(config, logger);
    const clean = await startCommand(runtime);
    detach();
    process.exitCode = clean ? 0 : 1;
  });

program
  .command('status')
  .description('Show fetcher, cache and scheduler status')
  .action(() => withRuntime((runtime, format) => statusCommand(runtime, format)));

program
  .command('quote')
  .description('Show the latest snapshot for one or more symbols')
  .argument('<symbols...>', 'six-digit exchange codes')
  .action((symbols: string[]) => withRuntime((runtime, format) => quoteCommand(runtime, symbols, format)));

program
  .command('history')
  .description('Summarize the historical series of a symbol')
  .argument('<symbol>', 'six-digit exchange code')
  .option('-p, --period <period>', 'lookback such as 60d, 4w, 6m or 1y')
  .action((symbol: string, options: { period?: string }) =>
    withRuntime((runtime, format) => historyCommand(runtime, symbol, options.period, format))
  );

const cache = program.command('cache').description('Inspect or clean the on-disk cache');

cache
  .command('stats')
  .description('Show cache size per namespace')
  .action(() => withRuntime((runtime, format) => cacheStatsCommand(runtime, format)));

cache
  .command('cleanup')
  .description('Delete expired entries and enforce the size budget')
  .option('-f, --force', 'Evict down to the target even when under budget', false)
  .action((options: { force: boolean }) =>
    withRuntime((runtime, format) => cacheCleanupCommand(runtime, options.force, format))
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  if (isConfigurationError(error)) {
    console.error(chalk.red(error.message));
  } else {
    console.error(chalk.red(`Error: ${describeError(error)}`));
  }
  process.exitCode = 1;
});
