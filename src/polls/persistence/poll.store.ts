import {
  NewPoll,
  PollListQuery,
  PollSnapshot,
  ReactionKind,
  VoteFact,
} from '../interfaces/poll-snapshot.interface';

export interface OptionRef {
  id: number;
  pollId: number;
}

/**
 * Transaction-scoped access to poll rows. An instance is only valid inside
 * the {@link PollStore.transaction} callback that created it; a lock taken
 * through it is held until that transaction commits or rolls back.
 */
export interface PollUnitOfWork {
  /** Exclusive row lock on the poll. Resolves false when the poll does not exist. */
  lockPoll(pollId: number): Promise<boolean>;
  deleteReaction(kind: ReactionKind, pollId: number, userId: number): Promise<void>;
  /** Inserts the relation row; an existing row is left as is. */
  insertReactionIfAbsent(kind: ReactionKind, pollId: number, userId: number): Promise<void>;
  countReactions(kind: ReactionKind, pollId: number): Promise<number>;
  writeReactionCounts(pollId: number, likes: number, dislikes: number): Promise<void>;

  findOption(optionId: number): Promise<OptionRef | null>;
  findVote(userId: number, pollId: number): Promise<VoteFact | null>;
  /** Inserts the vote fact unless (userId, pollId) already has one. */
  insertVoteIfAbsent(userId: number, pollId: number, optionId: number): Promise<void>;
  updateVoteOption(voteId: number, optionId: number): Promise<void>;
  /** Vote fact count per option; options without votes map to 0. */
  countVotes(optionIds: number[]): Promise<Map<number, number>>;
  writeOptionVotes(optionId: number, votes: number): Promise<void>;

  findSnapshot(pollId: number): Promise<PollSnapshot | null>;
}

export abstract class PollStore {
  abstract createPoll(userId: number, poll: NewPoll): Promise<PollSnapshot>;
  abstract findSnapshot(pollId: number): Promise<PollSnapshot | null>;
  abstract listSnapshots(query: PollListQuery): Promise<PollSnapshot[]>;
  abstract deletePoll(pollId: number): Promise<boolean>;
  /** pollId -> optionId for the polls the user has voted on. */
  abstract listUserVotes(userId: number, pollIds: number[]): Promise<Map<number, number>>;

  /**
   * Runs `work` in one transaction: committed when it resolves, rolled back
   * when it rejects. Lock timeouts and deadlocks surface as
   * TransientStoreException.
   */
  abstract transaction<T>(work: (unitOfWork: PollUnitOfWork) => Promise<T>): Promise<T>;
}
