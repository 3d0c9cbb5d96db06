import { ServiceUnavailableException } from '@nestjs/common';

/**
 * Lock wait timeout, deadlock or lost connection. The whole mutation can be
 * retried from the start.
 */
export class TransientStoreException extends ServiceUnavailableException {
  constructor(message = 'Storage temporarily unavailable', cause?: unknown) {
    super(message, { cause });
  }
}
