import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PollStore } from './persistence/poll.store';
import { CounterSyncService } from './counter-sync.service';
import { PollSnapshot, VoteFact } from './interfaces/poll-snapshot.interface';
import { PollEventBus } from '../events/poll-event-bus';
import { buildPollEvent, PollEvent } from '../events/poll-event';
import { TransientStoreException } from '../common/exceptions/transient-store.exception';

export type PollAction =
  | { type: 'like' }
  | { type: 'dislike' }
  | { type: 'vote'; optionId: number };

export interface PollMutationResult {
  poll: PollSnapshot;
  vote: VoteFact | null;
}

const DEFAULT_MUTATION_ATTEMPTS = 3;

/**
 * Runs a like/dislike/vote mutation and its counter sync in one transaction,
 * then announces the committed snapshot on the event bus.
 */
@Injectable()
export class PollAggregateService {
  private readonly logger = new Logger(PollAggregateService.name);
  private readonly maxAttempts: number;

  constructor(
    private readonly pollStore: PollStore,
    private readonly counterSync: CounterSyncService,
    private readonly eventBus: PollEventBus,
    configService: ConfigService,
  ) {
    const attempts = configService.get<number>('polls.mutationAttempts');
    this.maxAttempts =
      attempts !== undefined && Number.isInteger(attempts) && attempts > 0
        ? attempts
        : DEFAULT_MUTATION_ATTEMPTS;
  }

  async mutate(pollId: number, userId: number, action: PollAction): Promise<PollMutationResult> {
    const result = await this.runWithRetry(() =>
      this.pollStore.transaction(async (unitOfWork) => {
        let vote: VoteFact | null = null;

        if (action.type === 'vote') {
          vote = await this.counterSync.castVote(unitOfWork, userId, pollId, action.optionId);
        } else {
          await this.counterSync.syncLikeState(unitOfWork, pollId, userId, action.type);
        }

        const poll = await unitOfWork.findSnapshot(pollId);
        if (!poll) {
          throw new Error(`Poll ${pollId} vanished while locked`);
        }
        return { poll, vote };
      }),
    );

    // Committed at this point; the event never carries uncommitted counters
    this.publish(buildPollEvent('poll_updated', result.poll));
    return result;
  }

  /**
   * Bus failures are logged and dropped: the mutation they follow has already
   * committed.
   */
  publish(event: PollEvent): void {
    try {
      this.eventBus.publish(event);
    } catch (error) {
      this.logger.error(
        `Failed to publish ${event.eventType}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private async runWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!(error instanceof TransientStoreException) || attempt >= this.maxAttempts) {
          throw error;
        }
        this.logger.warn(`Transient store failure, retrying mutation (attempt ${attempt + 1}/${this.maxAttempts})`);
      }
    }
  }
}
