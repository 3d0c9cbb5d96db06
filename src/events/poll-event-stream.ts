import { Logger, MessageEvent } from '@nestjs/common';
import { Observable } from 'rxjs';
import { PollEventBus } from './poll-event-bus';

const logger = new Logger('PollEventStream');

/**
 * Server-sent events view of the bus. Every observer gets its own
 * subscription, released when the observer unsubscribes (client disconnect).
 */
export function streamPollEvents(eventBus: PollEventBus): Observable<MessageEvent> {
  return new Observable<MessageEvent>((observer) => {
    const subscription = eventBus.subscribe();

    const pump = async () => {
      for await (const event of subscription) {
        observer.next({ type: event.eventType, data: event.payload });
      }
      observer.complete();
    };

    pump().catch((error: unknown) => {
      logger.error('Poll event stream failed', error instanceof Error ? error.stack : error);
      observer.error(error);
    });

    return () => subscription.close();
  });
}
