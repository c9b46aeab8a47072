#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { createInterface } from 'readline/promises';
import { AppModule } from './app.module.js';
import { ContentError } from './common/errors/game-errors.js';
import { loadGameConfig } from './config/game-config.service.js';
import { GameCliService, type Terminal } from './cli/game-cli.service.js';

async function bootstrap() {
  const { logLevels } = loadGameConfig();
  const app = await NestFactory.createApplicationContext(AppModule, { logger: logLevels });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const terminal: Terminal = {
    question: (query, options) => rl.question(query, options),
    get line() {
      return rl.line;
    },
    print: (line) => process.stdout.write(`${line}\n`),
  };

  try {
    await app.get(GameCliService).run(terminal);
  } finally {
    rl.close();
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  if (err instanceof ContentError) {
    process.stderr.write(`The game data could not be loaded: ${err.message}\n`);
    if (err.details) process.stderr.write(`${JSON.stringify(err.details, null, 2)}\n`);
  } else {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  }
  process.exit(1);
});
