import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { WebserverSetupService } from '@infra/webserver/webserver-setup.service';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { describeThrown } from '@common/errors/single-line-message';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

dotenv.config();

const logger = new Logger('Main');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
  });
  app.enableShutdownHooks();
  await app.get(WebserverSetupService).setup(app);
}

bootstrap().catch((err: unknown) => {
  logger.error(`Failed to start: ${describeThrown(err)}`);
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.error(`An uncaught exception: ${describeThrown(err)}`);
});

process.on('unhandledRejection', (err: unknown) => {
  logger.error(`An unhandled rejection: ${describeThrown(err)}`);
});
