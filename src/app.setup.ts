import { INestApplication, ValidationError, ValidationPipe } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { ValidationException } from './common/exceptions/validation.exception';
import { toSnakeKey } from './common/utils/snake-case';

/**
 * Flattens nested errors to dotted snake_case paths, e.g. `options.0.text`.
 */
export function formatValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};
  for (const error of errors) {
    const property = toSnakeKey(error.property);
    const path = parentPath ? `${parentPath}.${property}` : property;
    if (error.constraints) {
      formatted[path] = Object.values(error.constraints);
    }
    if (error.children && error.children.length > 0) {
      Object.assign(formatted, formatValidationErrors(error.children, path));
    }
  }
  return formatted;
}

export function parseCorsOrigins(value: string | undefined): string[] | boolean {
  const origins = (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : true;
}

export function configureApp(app: INestApplication): void {
  app.enableCors({
    origin: parseCorsOrigins(process.env.CORS_ORIGINS),
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
  });

  app.setGlobalPrefix('api');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: (errors) => new ValidationException(formatValidationErrors(errors)),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new ResponseInterceptor(app.get(Reflector)));
}
