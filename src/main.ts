import 'reflect-metadata';

import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app = await NestFactory.create(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');

  app.enableShutdownHooks();

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, telegramEnabled=${String(appConfigService.telegramEnabled)}, walletTrackingEnabled=${String(appConfigService.walletTrackingEnabled)}, whaleAlertsEnabled=${String(appConfigService.whaleAlertsEnabled)}, persistence=${appConfigService.databaseUrl === null ? 'memory' : 'postgres'}`,
  );
  const swaggerConfig = new DocumentBuilder()
    .setTitle('Whale Watch Notifier API')
    .setDescription('Solana wallet tracking and whale alert subscriptions')
    .setVersion(appConfigService.appVersion)
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(appConfigService.port);
  logger.log(`Whale Watch Notifier is listening on port ${String(appConfigService.port)}.`);
};

void bootstrap();
