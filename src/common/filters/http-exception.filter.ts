import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ValidationException } from '../exceptions/validation.exception';

export interface ErrorEnvelope {
  status: false;
  code: number;
  message: string;
  payload: { errors: Record<string, string[]> } | null;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    if (host.getType() !== 'http') {
      throw exception;
    }

    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toEnvelope(exception);

    if (body.code >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        body.message,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    response.status(body.code).json(body);
  }

  private toEnvelope(exception: unknown): ErrorEnvelope {
    if (!(exception instanceof HttpException)) {
      return {
        status: false,
        code: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
        payload: null,
      };
    }

    return {
      status: false,
      code: exception.getStatus(),
      message: this.extractMessage(exception),
      payload:
        exception instanceof ValidationException
          ? { errors: exception.errors }
          : null,
    };
  }

  private extractMessage(exception: HttpException): string {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if ('message' in response) {
      const { message } = response;
      if (Array.isArray(message)) {
        return message.join(', ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return exception.message;
  }
}
