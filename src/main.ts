import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { LogLevelName, resolveLogLevels } from './config/logging';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const configService = app.get(ConfigService);
  app.useLogger(resolveLogLevels(configService.get<LogLevelName>('LOG_LEVEL', 'log')));
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Heat Pump Collector')
    .setDescription(
      'Heat pump and power meter collector with efficiency metrics and configuration change tracking',
    )
    .setVersion('1.0')
    .addTag('health', 'Service and source health endpoints')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = configService.get<number>('PORT', 3000);
  await app.listen(port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`Heat pump collector listening on http://localhost:${port}`);
  logger.log(`API documentation: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').fatal(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
