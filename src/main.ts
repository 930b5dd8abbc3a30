#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { createInterface } from 'readline/promises';
import { AppModule } from './app.module';
import { CliCommands, CliIO, ContextFactory } from './cli/commands';
import { runCli } from './cli/program';

const createContext: ContextFactory = async (configDir) => {
  const app = await NestFactory.createApplicationContext(
    AppModule.register({ configDir }),
    { bufferLogs: true },
  );
  app.useLogger(app.get(Logger));
  return app;
};

const io: CliIO = {
  print: (text) => {
    process.stdout.write(`${text}\n`);
  },
  prompt: async (question) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  },
};

async function bootstrap() {
  process.exitCode = await runCli(
    process.argv,
    new CliCommands(createContext, io),
  );
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
