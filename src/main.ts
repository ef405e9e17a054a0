import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { logger } from './core/logger/logger.config';

async function bootstrap() {
  const pinoLogger = logger();

  try {
    const app = await NestFactory.create(AppModule, {
      logger: false,
    });

    const configService = app.get(ConfigService);

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        transformOptions: {
          enableImplicitConversion: true,
        },
      }),
    );

    app.setGlobalPrefix('api');
    app.enableShutdownHooks();

    const port = configService.get<number>('PORT', 3001);
    await app.listen(port);

    pinoLogger.info(`Application running on: http://localhost:${port}`);
  } catch (error: unknown) {
    pinoLogger.error({ err: error }, 'Bootstrap failed');
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error({ err: error }, 'Failed to start application');
  process.exit(1);
});
