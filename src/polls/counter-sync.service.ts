import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { PollUnitOfWork } from './persistence/poll.store';
import { ReactionKind, VoteFact } from './interfaces/poll-snapshot.interface';

const OPPOSITE: Record<ReactionKind, ReactionKind> = {
  like: 'dislike',
  dislike: 'like',
};

/**
 * Keeps the poll's like/dislike counters and each option's vote counter equal
 * to the number of rows behind them. Counters are always recomputed from the
 * relation/fact rows, never incremented, under an exclusive lock on the poll
 * row so concurrent writers to the same poll serialize.
 *
 * Every method must run inside a {@link PollUnitOfWork} transaction.
 */
@Injectable()
export class CounterSyncService {
  async syncLikeState(
    unitOfWork: PollUnitOfWork,
    pollId: number,
    userId: number,
    target: ReactionKind,
  ): Promise<void> {
    const exists = await unitOfWork.lockPoll(pollId);
    if (!exists) {
      throw new NotFoundException('Poll not found');
    }

    await unitOfWork.deleteReaction(OPPOSITE[target], pollId, userId);
    await unitOfWork.insertReactionIfAbsent(target, pollId, userId);

    const likes = await unitOfWork.countReactions('like', pollId);
    const dislikes = await unitOfWork.countReactions('dislike', pollId);
    await unitOfWork.writeReactionCounts(pollId, likes, dislikes);
  }

  async castVote(
    unitOfWork: PollUnitOfWork,
    userId: number,
    pollId: number,
    optionId: number,
  ): Promise<VoteFact> {
    const option = await unitOfWork.findOption(optionId);
    if (!option) {
      throw new NotFoundException('Option not found');
    }
    if (option.pollId !== pollId) {
      throw new BadRequestException('Option does not belong to poll');
    }

    const exists = await unitOfWork.lockPoll(pollId);
    if (!exists) {
      throw new NotFoundException('Poll not found');
    }

    let vote = await unitOfWork.findVote(userId, pollId);

    if (!vote) {
      await unitOfWork.insertVoteIfAbsent(userId, pollId, optionId);
      vote = await unitOfWork.findVote(userId, pollId);
      if (!vote) {
        throw new Error(`Vote of user ${userId} on poll ${pollId} missing after insert`);
      }
      if (vote.optionId === optionId) {
        await this.syncOptionVotes(unitOfWork, [optionId]);
        return vote;
      }
      // Lost the insert to a concurrent first vote; treat ours as a revote
    }

    if (vote.optionId === optionId) {
      return vote;
    }

    const previousOptionId = vote.optionId;
    await unitOfWork.updateVoteOption(vote.id, optionId);
    await this.syncOptionVotes(unitOfWork, [previousOptionId, optionId]);

    return { ...vote, optionId };
  }

  private async syncOptionVotes(unitOfWork: PollUnitOfWork, optionIds: number[]): Promise<void> {
    const counts = await unitOfWork.countVotes(optionIds);
    for (const optionId of optionIds) {
      await unitOfWork.writeOptionVotes(optionId, counts.get(optionId) ?? 0);
    }
  }
}
