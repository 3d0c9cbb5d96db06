import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { Socket } from 'socket.io';
import { PollEventBus, PollEventSubscription } from '../events/poll-event-bus';

export type PollStreamClient = Pick<Socket, 'id' | 'emit'>;

/**
 * socket.io view of the poll event bus. Clients of the `/polls` namespace
 * receive `poll_created`, `poll_updated` and `poll_deleted` while connected.
 */
@WebSocketGateway({
  cors: {
    origin: '*',
    credentials: true,
  },
  namespace: '/polls',
})
export class PollsGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(PollsGateway.name);
  private readonly subscriptions = new Map<string, PollEventSubscription>();

  constructor(private readonly eventBus: PollEventBus) {}

  get connectionCount(): number {
    return this.subscriptions.size;
  }

  handleConnection(client: PollStreamClient) {
    this.subscriptions.get(client.id)?.close();

    const subscription = this.eventBus.subscribe();
    this.subscriptions.set(client.id, subscription);
    this.logger.log(`Client ${client.id} subscribed to poll events`);

    this.forward(client, subscription).catch((error: unknown) => {
      this.logger.error(
        `Poll event forwarding failed for client ${client.id}`,
        error instanceof Error ? error.stack : String(error),
      );
      this.release(client.id, subscription);
    });
  }

  handleDisconnect(client: PollStreamClient) {
    const subscription = this.subscriptions.get(client.id);
    if (subscription) {
      this.release(client.id, subscription);
      this.logger.log(`Client ${client.id} unsubscribed from poll events`);
    }
  }

  private async forward(client: PollStreamClient, subscription: PollEventSubscription) {
    for await (const event of subscription) {
      client.emit(event.eventType, event.payload);
    }
  }

  private release(clientId: string, subscription: PollEventSubscription) {
    subscription.close();
    if (this.subscriptions.get(clientId) === subscription) {
      this.subscriptions.delete(clientId);
    }
  }
}
