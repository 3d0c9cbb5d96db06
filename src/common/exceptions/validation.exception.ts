import { UnprocessableEntityException } from '@nestjs/common';

export class ValidationException extends UnprocessableEntityException {
  constructor(public readonly errors: Record<string, string[]>) {
    super('Validation failed');
  }
}
