import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { RAW_RESPONSE_KEY } from '../decorators/raw-response.decorator';
import { JsonValue, toSnakeCase } from '../utils/snake-case';

export interface ResponseEnvelope {
  status: boolean;
  code: number;
  message: string;
  payload: JsonValue;
}

@Injectable()
export class ResponseInterceptor implements NestInterceptor {
  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const raw = this.reflector.getAllAndOverride<boolean>(RAW_RESPONSE_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (raw) {
      return next.handle();
    }

    return next.handle().pipe(
      map((data: unknown): ResponseEnvelope => {
        const response = context.switchToHttp().getResponse<Response>();
        const statusCode = response.statusCode || 200;

        return {
          status: statusCode >= 200 && statusCode < 400,
          code: statusCode,
          message: this.getDefaultMessage(statusCode),
          payload: toSnakeCase(data),
        };
      }),
    );
  }

  private getDefaultMessage(statusCode: number): string {
    const messages: Record<number, string> = {
      200: 'Request successful',
      201: 'Resource created successfully',
      204: 'Resource deleted successfully',
    };
    return messages[statusCode] || 'Request successful';
  }
}
