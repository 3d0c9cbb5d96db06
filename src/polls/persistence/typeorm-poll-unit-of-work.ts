import { EntityManager, EntityTarget, In } from 'typeorm';
import { Poll } from '../entities/poll.entity';
import { PollOption } from '../entities/poll-option.entity';
import { PollLike } from '../entities/poll-like.entity';
import { PollDislike } from '../entities/poll-dislike.entity';
import { PollVote } from '../entities/poll-vote.entity';
import { PollSnapshot, ReactionKind, VoteFact } from '../interfaces/poll-snapshot.interface';
import { OptionRef, PollUnitOfWork } from './poll.store';
import { POLL_SNAPSHOT_RELATIONS, toPollSnapshot } from './poll-snapshot.mapper';

type ReactionRow = PollLike | PollDislike;

const reactionEntity = (kind: ReactionKind): EntityTarget<ReactionRow> =>
  kind === 'like' ? PollLike : PollDislike;

function toVoteFact(vote: PollVote): VoteFact {
  return {
    id: vote.id,
    userId: vote.userId,
    pollId: vote.pollId,
    optionId: vote.optionId,
    createdAt: vote.createdAt,
  };
}

export class TypeOrmPollUnitOfWork implements PollUnitOfWork {
  constructor(private readonly manager: EntityManager) {}

  async lockPoll(pollId: number): Promise<boolean> {
    const poll = await this.manager
      .getRepository(Poll)
      .createQueryBuilder('poll')
      .select('poll.id')
      .where('poll.id = :pollId', { pollId })
      .setLock('pessimistic_write')
      .getOne();
    return poll !== null;
  }

  async deleteReaction(kind: ReactionKind, pollId: number, userId: number): Promise<void> {
    await this.manager.delete(reactionEntity(kind), { pollId, userId });
  }

  async insertReactionIfAbsent(kind: ReactionKind, pollId: number, userId: number): Promise<void> {
    await this.manager
      .createQueryBuilder()
      .insert()
      .into(reactionEntity(kind))
      .values({ pollId, userId })
      .orIgnore()
      .execute();
  }

  countReactions(kind: ReactionKind, pollId: number): Promise<number> {
    return this.manager.count(reactionEntity(kind), { where: { pollId } });
  }

  async writeReactionCounts(pollId: number, likes: number, dislikes: number): Promise<void> {
    await this.manager.update(Poll, { id: pollId }, { likes, dislikes });
  }

  async findOption(optionId: number): Promise<OptionRef | null> {
    const option = await this.manager.findOne(PollOption, {
      select: { id: true, pollId: true },
      where: { id: optionId },
    });
    return option ? { id: option.id, pollId: option.pollId } : null;
  }

  async findVote(userId: number, pollId: number): Promise<VoteFact | null> {
    const vote = await this.manager.findOne(PollVote, { where: { userId, pollId } });
    return vote ? toVoteFact(vote) : null;
  }

  async insertVoteIfAbsent(userId: number, pollId: number, optionId: number): Promise<void> {
    await this.manager
      .createQueryBuilder()
      .insert()
      .into(PollVote)
      .values({ userId, pollId, optionId })
      .orIgnore()
      .execute();
  }

  async updateVoteOption(voteId: number, optionId: number): Promise<void> {
    await this.manager.update(PollVote, { id: voteId }, { optionId });
  }

  async countVotes(optionIds: number[]): Promise<Map<number, number>> {
    const counts = new Map<number, number>(optionIds.map((id) => [id, 0]));
    if (optionIds.length === 0) {
      return counts;
    }

    const rows = await this.manager
      .createQueryBuilder(PollVote, 'vote')
      .select('vote.optionId', 'optionId')
      .addSelect('COUNT(*)', 'total')
      .where({ optionId: In(optionIds) })
      .groupBy('vote.optionId')
      .getRawMany<{ optionId: number | string; total: number | string }>();

    for (const row of rows) {
      // mysql2 returns COUNT(*) as a string
      counts.set(Number(row.optionId), Number(row.total));
    }
    return counts;
  }

  async writeOptionVotes(optionId: number, votes: number): Promise<void> {
    await this.manager.update(PollOption, { id: optionId }, { votes });
  }

  async findSnapshot(pollId: number): Promise<PollSnapshot | null> {
    const poll = await this.manager.findOne(Poll, {
      where: { id: pollId },
      relations: POLL_SNAPSHOT_RELATIONS,
    });
    return poll ? toPollSnapshot(poll) : null;
  }
}
