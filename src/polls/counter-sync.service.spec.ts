import { BadRequestException, NotFoundException } from '@nestjs/common';
import { CounterSyncService } from './counter-sync.service';
import { PollUnitOfWork } from './persistence/poll.store';
import { createPollFixture, PollFixture } from '../../test/support/poll-fixtures';

describe('CounterSyncService', () => {
  const counterSync = new CounterSyncService();
  let fixture: PollFixture;

  beforeEach(async () => {
    fixture = await createPollFixture(3);
  });

  const like = (userId: number, target: 'like' | 'dislike', pollId = fixture.poll.id) =>
    fixture.store.transaction((uow) => counterSync.syncLikeState(uow, pollId, userId, target));

  const vote = (userId: number, optionId: number, pollId = fixture.poll.id) =>
    fixture.store.transaction((uow) => counterSync.castVote(uow, userId, pollId, optionId));

  const counters = async () => {
    const poll = await fixture.store.findSnapshot(fixture.poll.id);
    return {
      likes: poll?.likes,
      dislikes: poll?.dislikes,
      votes: poll?.options.map((option) => option.votes),
    };
  };

  describe('syncLikeState', () => {
    it('counts a repeated like once', async () => {
      await like(2, 'like');
      await like(2, 'like');

      expect(await counters()).toMatchObject({ likes: 1, dislikes: 0 });
      expect(fixture.store.likes.size).toBe(1);
    });

    it('moves a like to a dislike', async () => {
      await like(2, 'like');
      await like(2, 'dislike');

      expect(await counters()).toMatchObject({ likes: 0, dislikes: 1 });
      expect(fixture.store.likes.size).toBe(0);
      expect(Array.from(fixture.store.dislikes.values())).toEqual([
        { pollId: fixture.poll.id, userId: 2 },
      ]);
    });

    it('repairs counters that drifted from the relation rows', async () => {
      const row = fixture.store.polls.get(fixture.poll.id);
      if (row) fixture.store.polls.set(row.id, { ...row, likes: 42, dislikes: 7 });

      await like(3, 'dislike');

      expect(await counters()).toMatchObject({ likes: 0, dislikes: 1 });
    });

    it('rejects an unknown poll', async () => {
      await expect(like(2, 'like', 999)).rejects.toThrow(new NotFoundException('Poll not found'));
      expect(fixture.store.likes.size).toBe(0);
    });

    it('keeps counters equal to rows under concurrent toggles', async () => {
      const targets: ('like' | 'dislike')[] = ['like', 'dislike', 'like', 'like', 'dislike', 'like'];
      await Promise.all(
        targets.map((target, index) => like((index % 3) + 1, target)),
      );

      const { likes, dislikes } = await counters();
      expect(likes).toBe(fixture.store.likes.size);
      expect(dislikes).toBe(fixture.store.dislikes.size);
      expect(fixture.store.likes.size + fixture.store.dislikes.size).toBe(3);
    });
  });

  describe('castVote', () => {
    it('records a first vote', async () => {
      const fact = await vote(2, fixture.optionA);

      expect(fact).toMatchObject({ userId: 2, pollId: fixture.poll.id, optionId: fixture.optionA });
      expect(await counters()).toMatchObject({ votes: [1, 0] });
    });

    it('treats the same vote twice as a no-op', async () => {
      const first = await vote(2, fixture.optionA);
      const second = await vote(2, fixture.optionA);

      expect(second).toEqual(first);
      expect(fixture.store.votes.size).toBe(1);
      expect(await counters()).toMatchObject({ votes: [1, 0] });
    });

    it('moves a revote to the new option in place', async () => {
      const first = await vote(2, fixture.optionA);
      const second = await vote(2, fixture.optionB);

      expect(second.id).toBe(first.id);
      expect(second.optionId).toBe(fixture.optionB);
      expect(fixture.store.votes.size).toBe(1);
      expect(await counters()).toMatchObject({ votes: [0, 1] });
    });

    it('rejects an unknown option', async () => {
      await expect(vote(2, 999)).rejects.toThrow(new NotFoundException('Option not found'));
    });

    it('rejects an option of another poll', async () => {
      const other = await fixture.store.createPoll(2, {
        title: 'Dinner',
        description: null,
        pollExpiresAt: null,
        options: ['C', 'D'],
      });

      await expect(vote(2, other.options[0].id)).rejects.toThrow(
        new BadRequestException('Option does not belong to poll'),
      );
      expect(fixture.store.votes.size).toBe(0);
    });

    it('leaves one vote row per user when first votes race', async () => {
      await Promise.all([vote(2, fixture.optionA), vote(2, fixture.optionB), vote(3, fixture.optionA)]);

      expect(fixture.store.votes.size).toBe(2);
      expect(fixture.store.optionVotes(fixture.optionA)).toBe(fixture.store.countVoteRows(fixture.optionA));
      expect(fixture.store.optionVotes(fixture.optionB)).toBe(fixture.store.countVoteRows(fixture.optionB));
    });

    it('falls back to a revote when a concurrent insert won', async () => {
      const existing = { id: 5, userId: 2, pollId: 1, optionId: 10, createdAt: new Date(0) };
      const unitOfWork: jest.Mocked<PollUnitOfWork> = {
        lockPoll: jest.fn().mockResolvedValue(true),
        deleteReaction: jest.fn(),
        insertReactionIfAbsent: jest.fn(),
        countReactions: jest.fn(),
        writeReactionCounts: jest.fn(),
        findOption: jest.fn().mockResolvedValue({ id: 11, pollId: 1 }),
        findVote: jest.fn().mockResolvedValueOnce(null).mockResolvedValueOnce(existing),
        insertVoteIfAbsent: jest.fn().mockResolvedValue(undefined),
        updateVoteOption: jest.fn().mockResolvedValue(undefined),
        countVotes: jest.fn().mockResolvedValue(new Map([[10, 0], [11, 1]])),
        writeOptionVotes: jest.fn().mockResolvedValue(undefined),
        findSnapshot: jest.fn(),
      };

      const fact = await counterSync.castVote(unitOfWork, 2, 1, 11);

      expect(fact).toEqual({ ...existing, optionId: 11 });
      expect(unitOfWork.updateVoteOption).toHaveBeenCalledWith(5, 11);
      expect(unitOfWork.countVotes).toHaveBeenCalledWith([10, 11]);
      expect(unitOfWork.writeOptionVotes).toHaveBeenCalledWith(10, 0);
      expect(unitOfWork.writeOptionVotes).toHaveBeenCalledWith(11, 1);
    });
  });
});
