import {
  ForbiddenException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { PollStore } from './persistence/poll.store';
import { PollAggregateService } from './poll-aggregate.service';
import { CreatePollDto } from './dto/create-poll.dto';
import { ListPollsDto } from './dto/list-polls.dto';
import {
  PollListQuery,
  PollSnapshot,
  PollView,
} from './interfaces/poll-snapshot.interface';
import { buildPollDeletedEvent, buildPollEvent } from '../events/poll-event';
import { AuthUser } from '../auth/interfaces/auth-user.interface';
import { LogServiceErrors } from '../common/decorators/log-service-errors.decorator';

@Injectable()
export class PollsService {
  constructor(
    private readonly pollStore: PollStore,
    private readonly pollAggregate: PollAggregateService,
  ) {}

  @LogServiceErrors('create_poll')
  async createPoll(userId: number, createPollDto: CreatePollDto): Promise<PollSnapshot> {
    const poll = await this.pollStore.createPoll(userId, {
      title: createPollDto.title.trim(),
      description: createPollDto.description ?? null,
      pollExpiresAt: createPollDto.pollExpiresAt ?? null,
      options: createPollDto.options.map((option) => option.text.trim()),
    });

    this.pollAggregate.publish(buildPollEvent('poll_created', poll));
    return poll;
  }

  @LogServiceErrors('get_poll')
  async getPoll(pollId: number, viewerId?: number): Promise<PollView> {
    const poll = await this.pollStore.findSnapshot(pollId);
    if (!poll) {
      throw new NotFoundException('Poll not found');
    }
    const [view] = await this.withViewerVotes([poll], viewerId);
    return view;
  }

  @LogServiceErrors('list_polls')
  async listPolls(listPollsDto: ListPollsDto, viewerId?: number): Promise<PollView[]> {
    const polls = await this.pollStore.listSnapshots(this.toListQuery(listPollsDto));
    return this.withViewerVotes(polls, viewerId);
  }

  @LogServiceErrors('list_polls_by_user')
  async listPollsByUser(userId: number, listPollsDto: ListPollsDto): Promise<PollView[]> {
    const polls = await this.pollStore.listSnapshots({
      ...this.toListQuery(listPollsDto),
      createdBy: userId,
    });
    return this.withViewerVotes(polls, userId);
  }

  @LogServiceErrors('like_poll')
  async likePoll(pollId: number, userId: number): Promise<PollSnapshot> {
    const { poll } = await this.pollAggregate.mutate(pollId, userId, { type: 'like' });
    return poll;
  }

  @LogServiceErrors('dislike_poll')
  async dislikePoll(pollId: number, userId: number): Promise<PollSnapshot> {
    const { poll } = await this.pollAggregate.mutate(pollId, userId, { type: 'dislike' });
    return poll;
  }

  @LogServiceErrors('delete_poll')
  async deletePoll(pollId: number, actor: AuthUser): Promise<void> {
    const poll = await this.pollStore.findSnapshot(pollId);
    if (!poll) {
      throw new NotFoundException('Poll not found');
    }
    if (poll.createdBy !== actor.userId && !actor.isAdmin) {
      throw new ForbiddenException('Not allowed to delete this poll');
    }

    const deleted = await this.pollStore.deletePoll(pollId);
    if (deleted) {
      this.pollAggregate.publish(buildPollDeletedEvent(pollId));
    }
  }

  private toListQuery(listPollsDto: ListPollsDto): PollListQuery {
    return {
      sortBy: listPollsDto.sortBy ?? 'created_at',
      limit: listPollsDto.limit ?? 50,
      offset: listPollsDto.offset ?? 0,
    };
  }

  private async withViewerVotes(polls: PollSnapshot[], viewerId?: number): Promise<PollView[]> {
    const votes =
      viewerId === undefined
        ? new Map<number, number>()
        : await this.pollStore.listUserVotes(
            viewerId,
            polls.map((poll) => poll.id),
          );
    return polls.map((poll) => ({ ...poll, myVoteOptionId: votes.get(poll.id) ?? null }));
  }
}
