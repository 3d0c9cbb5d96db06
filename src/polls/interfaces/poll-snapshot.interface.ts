export interface PollUserSummary {
  id: number;
  email: string;
  fullName: string | null;
  isAdmin: boolean;
  createdAt: Date;
}

export interface PollOptionSnapshot {
  id: number;
  text: string;
  votes: number;
}

/**
 * Read model of a poll aggregate: the poll row, its options in id order and
 * the users behind the like/dislike relations. `likes`, `dislikes` and each
 * option's `votes` are the persisted counters written by the counter sync.
 */
export interface PollSnapshot {
  id: number;
  title: string;
  description: string | null;
  pollExpiresAt: Date | null;
  likes: number;
  dislikes: number;
  createdAt: Date;
  updatedAt: Date | null;
  createdBy: number | null;
  options: PollOptionSnapshot[];
  creator: PollUserSummary | null;
  likedBy: PollUserSummary[];
  dislikedBy: PollUserSummary[];
}

export interface PollView extends PollSnapshot {
  myVoteOptionId: number | null;
}

export interface VoteFact {
  id: number;
  userId: number;
  pollId: number;
  optionId: number;
  createdAt: Date;
}

export type ReactionKind = 'like' | 'dislike';

export type PollSortKey = 'created_at' | 'likes';

export interface PollListQuery {
  sortBy: PollSortKey;
  limit: number;
  offset: number;
  createdBy?: number;
}

export interface NewPoll {
  title: string;
  description: string | null;
  pollExpiresAt: Date | null;
  options: string[];
}
