import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: ['error', 'warn', 'log', 'debug', 'verbose'],
    });

    const configService = app.get(ConfigService);
    const environment = configService.get<string>('NODE_ENV', 'development');
    const dbType = configService.get<string>('DB_TYPE', 'postgres');

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    signals.forEach((signal) => {
      process.on(signal, () => {
        logger.log(`Received ${signal}, starting graceful shutdown`);
        app
          .close()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Shutdown failed', error instanceof Error ? error.stack : String(error));
            process.exit(1);
          });
      });
    });

    logger.log(`Repair service started`, { environment, dbType });
  } catch (error) {
    logger.error('Failed to start repair service:', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();
