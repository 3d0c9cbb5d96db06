import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, QueryFailedError, Repository } from 'typeorm';
import { Poll } from '../entities/poll.entity';
import { PollVote } from '../entities/poll-vote.entity';
import {
  NewPoll,
  PollListQuery,
  PollSnapshot,
} from '../interfaces/poll-snapshot.interface';
import { PollStore, PollUnitOfWork } from './poll.store';
import { POLL_SNAPSHOT_RELATIONS, toPollSnapshot } from './poll-snapshot.mapper';
import { TypeOrmPollUnitOfWork } from './typeorm-poll-unit-of-work';
import { TransientStoreException } from '../../common/exceptions/transient-store.exception';

// MySQL lock/deadlock codes plus connection drops
const TRANSIENT_ERROR_CODES = new Set([
  'ER_LOCK_DEADLOCK',
  'ER_LOCK_WAIT_TIMEOUT',
  'PROTOCOL_CONNECTION_LOST',
  'ECONNRESET',
  'ETIMEDOUT',
]);

export function isTransientStoreError(error: unknown): boolean {
  const source = error instanceof QueryFailedError ? error.driverError : error;
  return (
    source instanceof Error &&
    'code' in source &&
    typeof source.code === 'string' &&
    TRANSIENT_ERROR_CODES.has(source.code)
  );
}

@Injectable()
export class TypeOrmPollStore extends PollStore {
  private readonly logger = new Logger(TypeOrmPollStore.name);

  constructor(
    @InjectRepository(Poll)
    private pollRepository: Repository<Poll>,
    @InjectRepository(PollVote)
    private voteRepository: Repository<PollVote>,
    private dataSource: DataSource,
  ) {
    super();
  }

  async createPoll(userId: number, input: NewPoll): Promise<PollSnapshot> {
    const poll = await this.pollRepository.save(
      this.pollRepository.create({
        title: input.title,
        description: input.description,
        pollExpiresAt: input.pollExpiresAt,
        createdBy: userId,
        likes: 0,
        dislikes: 0,
        options: input.options.map((text) => ({ text, votes: 0 })),
      }),
    );

    // Reload so relations and database defaults are present
    const snapshot = await this.findSnapshot(poll.id);
    if (!snapshot) {
      throw new Error(`Poll ${poll.id} not found after creation`);
    }
    return snapshot;
  }

  async findSnapshot(pollId: number): Promise<PollSnapshot | null> {
    const poll = await this.pollRepository.findOne({
      where: { id: pollId },
      relations: POLL_SNAPSHOT_RELATIONS,
    });
    return poll ? toPollSnapshot(poll) : null;
  }

  async listSnapshots(query: PollListQuery): Promise<PollSnapshot[]> {
    const polls = await this.pollRepository.find({
      where: query.createdBy !== undefined ? { createdBy: query.createdBy } : {},
      relations: POLL_SNAPSHOT_RELATIONS,
      order:
        query.sortBy === 'likes'
          ? { likes: 'DESC', id: 'DESC' }
          : { createdAt: 'DESC', id: 'DESC' },
      skip: query.offset,
      take: query.limit,
    });
    return polls.map(toPollSnapshot);
  }

  async deletePoll(pollId: number): Promise<boolean> {
    const result = await this.pollRepository.delete({ id: pollId });
    return (result.affected ?? 0) > 0;
  }

  async listUserVotes(userId: number, pollIds: number[]): Promise<Map<number, number>> {
    if (pollIds.length === 0) {
      return new Map();
    }
    const votes = await this.voteRepository.find({
      select: { pollId: true, optionId: true },
      where: { userId, pollId: In(pollIds) },
    });
    return new Map(votes.map((vote) => [vote.pollId, vote.optionId]));
  }

  async transaction<T>(work: (unitOfWork: PollUnitOfWork) => Promise<T>): Promise<T> {
    try {
      return await this.dataSource.transaction((manager) =>
        work(new TypeOrmPollUnitOfWork(manager)),
      );
    } catch (error) {
      if (isTransientStoreError(error)) {
        this.logger.warn(
          `Transient store failure: ${error instanceof Error ? error.message : String(error)}`,
        );
        throw new TransientStoreException(undefined, error);
      }
      throw error;
    }
  }
}
