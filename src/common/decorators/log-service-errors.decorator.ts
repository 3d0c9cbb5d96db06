import { HttpException, HttpStatus, Logger } from '@nestjs/common';

const SCRUBBED_KEYS = new Set(['password', 'hashedPassword', 'passwordHash', 'token', 'accessToken']);

function scrub(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(scrub);
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = SCRUBBED_KEYS.has(key) ? '<redacted>' : scrub(entry);
  }
  return result;
}

/**
 * Logs failures of an async service method with its operation name and
 * (scrubbed) arguments, then rethrows. Client errors are logged as warnings,
 * everything else as errors with a stack.
 */
export function LogServiceErrors(operation: string) {
  return (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): void => {
    const original: unknown = descriptor.value;
    if (typeof original !== 'function') {
      return;
    }

    const service = target.constructor.name;
    const method = String(propertyKey);
    const logger = new Logger(service);

    descriptor.value = async function (this: unknown, ...args: unknown[]): Promise<unknown> {
      try {
        const result: unknown = await Reflect.apply(original, this, args);
        return result;
      } catch (error) {
        const context = { operation, service, method, args: scrub(args) };

        if (error instanceof HttpException && error.getStatus() < HttpStatus.INTERNAL_SERVER_ERROR) {
          logger.warn({
            event: 'service_error',
            ...context,
            detail: error.message,
            statusCode: error.getStatus(),
          });
        } else {
          const entry = {
            event: 'service_unexpected_error',
            ...context,
            error: error instanceof Error ? error.message : String(error),
          };
          if (error instanceof Error && error.stack) {
            logger.error(entry, error.stack);
          } else {
            logger.error(entry);
          }
        }
        throw error;
      }
    };
  };
}
