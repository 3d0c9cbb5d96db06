import { Poll } from '../entities/poll.entity';
import { User } from '../../users/entities/user.entity';
import { PollSnapshot, PollUserSummary } from '../interfaces/poll-snapshot.interface';

export const POLL_SNAPSHOT_RELATIONS = {
  creator: true,
  options: true,
  likeRows: { user: true },
  dislikeRows: { user: true },
} as const;

function toUserSummary(user: User): PollUserSummary {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    isAdmin: user.isAdmin,
    createdAt: user.createdAt,
  };
}

export function toPollSnapshot(poll: Poll): PollSnapshot {
  return {
    id: poll.id,
    title: poll.title,
    description: poll.description,
    pollExpiresAt: poll.pollExpiresAt,
    likes: poll.likes,
    dislikes: poll.dislikes,
    createdAt: poll.createdAt,
    updatedAt: poll.updatedAt,
    createdBy: poll.createdBy,
    options: [...(poll.options ?? [])]
      .sort((a, b) => a.id - b.id)
      .map((option) => ({ id: option.id, text: option.text, votes: option.votes })),
    creator: poll.creator ? toUserSummary(poll.creator) : null,
    likedBy: (poll.likeRows ?? []).map((row) => toUserSummary(row.user)),
    dislikedBy: (poll.dislikeRows ?? []).map((row) => toUserSummary(row.user)),
  };
}
