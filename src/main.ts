#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliCommand, parseCliArgs, USAGE } from './cli/cli.options';
import { CliRunner } from './cli/cli.runner';
import { getErrorMessage, UsageError } from './common/errors';
import { Env, loadEnv, logLevelsFor } from './config/env';
import { buildTrackerConfig, TrackerConfig } from './config/tracker.config';

const logger = new Logger('PriceTracker');

interface Invocation {
  env: Env;
  config: TrackerConfig;
  command: CliCommand;
}

function prepare(argv: string[]): Invocation | null {
  try {
    const env = loadEnv();
    const config = buildTrackerConfig(env);
    return { env, config, command: parseCliArgs(argv, config) };
  } catch (error) {
    logger.error(getErrorMessage(error));
    if (error instanceof UsageError) process.stderr.write(`\n${USAGE}`);
    return null;
  }
}

async function bootstrap(): Promise<number> {
  const invocation = prepare(process.argv.slice(2));
  if (!invocation) return 1;
  const { env, config, command } = invocation;

  if (command.mode === 'help') {
    process.stdout.write(USAGE);
    return 0;
  }

  const app = await NestFactory.createApplicationContext(AppModule.register(config), {
    logger: logLevelsFor(env.LOG_LEVEL),
  });
  app.enableShutdownHooks();

  const exitCode = await app.get(CliRunner).run(command);
  // watch mode keeps the context alive until SIGINT/SIGTERM
  if (command.mode !== 'watch' || exitCode !== 0) {
    await app.close();
  }
  return exitCode;
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error(`Unexpected failure: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
