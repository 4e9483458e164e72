#!/usr/bin/env node
/**
 * taskgraph-rag - answers questions from site-restricted web search
 *
 * `serve` exposes the answer workflow over HTTP, `ask` runs it once.
 */

import type { Server } from 'http';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { config as loadEnv } from 'dotenv';
import type { CLIOptions, Config } from './types';
import { loadConfig, validateConfig } from './config';
import { initLogger, getLogger } from './utils/logger';
import { GraphExecutor } from './core/executor';
import { LlmClient, SerperSearchClient, WebScraper } from './clients';
import { answerQuery, type WorkflowServices } from './workflow';
import { createApp } from './server';

// Load environment variables
loadEnv();

const VERSION = '0.1.0';

interface ServeFlags {
  host?: string;
  port?: number;
  config?: string;
  verbose: boolean;
  maxParallel?: number;
}

interface AskFlags {
  config?: string;
  verbose: boolean;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Load, log and validate configuration; exits on invalid settings
 */
function setup(options: CLIOptions): Config {
  const config = loadConfig(options);

  initLogger({
    level: config.logging.level,
    file: config.logging.file,
    console: config.logging.console,
  });

  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    console.error(chalk.red('Configuration errors:'));
    for (const error of configErrors) {
      console.error(chalk.red(`  • ${error}`));
    }
    process.exit(1);
  }

  return config;
}

function createServices(config: Config): WorkflowServices {
  return {
    llm: new LlmClient(config.llm),
    search: new SerperSearchClient(config.search),
    scraper: new WebScraper(config.scraper),
    minContentLength: config.scraper.minContentLength,
  };
}

function createExecutor(config: Config): GraphExecutor {
  return new GraphExecutor({
    maxParallel: config.execution.maxParallel,
    taskTimeoutMs: config.execution.taskTimeoutMs,
  });
}

function setupSignalHandlers(server: Server): void {
  const logger = getLogger();
  let shuttingDown = false;

  const handleSignal = (signal: string) => {
    if (shuttingDown) {
      logger.warn('Forced shutdown');
      process.exit(1);
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close((error) => {
      if (error) {
        logger.error('Error during shutdown', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => handleSignal('SIGINT'));
  process.on('SIGTERM', () => handleSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.critical('Unhandled rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    process.exit(1);
  });
}

function serve(flags: ServeFlags): void {
  const config = setup(flags);
  const logger = getLogger();

  const app = createApp({ services: createServices(config), executor: createExecutor(config) });
  const { host, port } = config.server;

  const server = app.listen(port, host, () => {
    logger.info('Server listening', { host, port, model: config.llm.model, site: config.search.site });
    console.log(chalk.bold.cyan(`\nServing on http://${host}:${port}\n`));
  });

  setupSignalHandlers(server);
}

async function ask(query: string, flags: AskFlags): Promise<void> {
  if (query.trim().length === 0) {
    console.error(chalk.red('Query cannot be empty or only whitespace'));
    process.exit(1);
  }

  const config = setup(flags);
  const spinner = ora('Answering...').start();

  const outcome = await answerQuery(query, createServices(config), createExecutor(config));

  if (outcome.status === 'failed') {
    spinner.fail(outcome.reason);
    process.exit(1);
  }

  spinner.succeed(`Answered in ${Math.round(outcome.result.durationMs)}ms`);
  console.log('\n' + outcome.answer);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('taskgraph-rag')
    .description('Answer questions from site-restricted web search')
    .version(VERSION);

  program
    .command('serve')
    .description('Start the HTTP server')
    .option('--host <host>', 'Interface to bind')
    .option('--port <number>', 'Port to listen on', parseInteger)
    .option('-c, --config <path>', 'Path to config file')
    .option('-p, --max-parallel <number>', 'Maximum parallel tasks (0 = unbounded)', parseInteger)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action((flags: ServeFlags) => serve(flags));

  program
    .command('ask')
    .description('Answer a single question and exit')
    .argument('<query>', 'Question to answer')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action((query: string, flags: AskFlags) => ask(query, flags));

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
