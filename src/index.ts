#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { APP_NAME, APP_VERSION } from './constants';
import { createLoginCommand } from './cli/login';
import { createInfoCommand } from './cli/info';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';

// Handle unhandled rejections
process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

process.on('uncaughtException', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

process.on('SIGINT', () => {
  console.error(chalk.yellow('\nInterrupted'));
  process.exit(130);
});

program
  .name(APP_NAME)
  .description(
    chalk.blue.bold('Mail auth CLI') +
    '\n\nSRP login and private-key unlock against the mail API.'
  )
  .version(APP_VERSION, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('-q, --quiet', 'Suppress all non-error output')
  .option('--api-url <url>', 'API base URL (default: $MAIL_AUTH_API_URL or the public API)')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ debug?: boolean; quiet?: boolean }>();

    // Set debug mode
    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    // Set quiet mode
    if (opts.quiet) {
      process.env.QUIET = 'true';
      logger.setLevel(LogLevel.WARN);
    }
  });

program.addCommand(createInfoCommand());
program.addCommand(createLoginCommand());

// Custom help
program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log(`  $ ${APP_NAME} info user@example.com`);
  console.log(`  $ ${APP_NAME} login -u user@example.com`);
  console.log(`  $ echo "$PASSWORD" | ${APP_NAME} login -u user@example.com --password-stdin`);
  console.log('');
  console.log(chalk.dim('For more information on a specific command:'));
  console.log(`  $ ${APP_NAME} <command> --help`);
});

program.parse();
