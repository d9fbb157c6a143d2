import 'reflect-metadata';
import { config } from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { validateEnvironmentVariables } from './common/config/env.validation';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { validationExceptionFactory } from './common/exceptions/validation-failed.exception';
import { LoggingService } from './modules/logging/logging.service';
import { buildSwaggerConfig, swaggerCustomOptions } from './modules/swagger/swagger.config';

config();

async function bootstrap() {
  // Validate environment variables before starting application
  validateEnvironmentVariables();

  // Create Winston-based logger before NestFactory to capture bootstrap logs
  const loggingService = new LoggingService();

  const app = await NestFactory.create(AppModule, {
    logger: loggingService,
  });

  // Apply global exception filter for standardized error responses
  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
    }),
  );

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
  });

  const document = SwaggerModule.createDocument(app, buildSwaggerConfig());
  SwaggerModule.setup('api/docs', app, document, swaggerCustomOptions);

  const port = process.env.PORT || 3001;
  await app.listen(port);
  loggingService.log(`Club Membership API is running on: http://localhost:${port}`, 'Bootstrap');
  loggingService.log(`Swagger UI available at: http://localhost:${port}/api/docs`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  new LoggingService().error(
    `Failed to start application: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
