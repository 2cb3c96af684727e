import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { SERVICE_PORTS } from '@app/common';
import { AppModule } from './app.module';
import { configureHttpApp } from './app.setup';

const logger = new Logger('WalletService');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  configureHttpApp(app);
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = Number(
    configService.get<string>('PORT', String(SERVICE_PORTS.WALLET_SERVICE)),
  );
  await app.listen(port);

  logger.log(`Running on port ${String(port)}`);
}

bootstrap().catch((err: unknown) => {
  logger.error('Failed to bootstrap application', err);
  process.exit(1);
});
