import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { resolveLogLevels } from './core/config/log-levels';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Configuration
  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3000);
  app.useLogger(resolveLogLevels(configService.get<string>('LOG_LEVEL')));

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
    forbidNonWhitelisted: true,
  }));

  app.setGlobalPrefix('api');
  // cancels running reviews on SIGTERM
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
      .setTitle('Review Orchestrator API')
      .setDescription('Multi-agent code review of pull request changes')
      .setVersion('1.0')
      .addTag('reviews')
      .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  await app.listen(port);
  new Logger('Bootstrap').log(`Application is running on: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
