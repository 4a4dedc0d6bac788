import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  // Validation globale des DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  app.enableShutdownHooks();
  app.setGlobalPrefix('api');

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') || 3000;

  await app.listen(port);

  logger.log(`Application démarrée sur http://localhost:${port}`);
  logger.log(`Configuration IMAP: ${configService.get<string>('imap.host')}:${configService.get<number>('imap.port')}`);
  logger.log(`Base de déduplication: ${configService.get<string>('app.dbPath')}`);
}

bootstrap().catch((error) => {
  new Logger('Bootstrap').error(`Démarrage impossible: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
