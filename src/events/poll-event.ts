import {
  PollSnapshot,
  PollUserSummary,
} from '../polls/interfaces/poll-snapshot.interface';

export type PollEventType = 'poll_created' | 'poll_updated' | 'poll_deleted';

export interface SerializedPollUser {
  id: number;
  email: string;
  full_name: string | null;
  is_admin: boolean;
  created_at: string;
}

export interface SerializedPoll {
  id: number;
  title: string;
  description: string | null;
  poll_expires_at: string | null;
  likes: number;
  dislikes: number;
  created_at: string;
  updated_at: string | null;
  created_by: number | null;
  options: { id: number; text: string; votes: number }[];
  creator: SerializedPollUser | null;
  liked_by: SerializedPollUser[];
  disliked_by: SerializedPollUser[];
}

export type PollEvent =
  | {
      readonly eventType: 'poll_created' | 'poll_updated';
      readonly payload: { readonly poll: SerializedPoll };
    }
  | {
      readonly eventType: 'poll_deleted';
      readonly payload: { readonly poll_id: number };
    };

function serializeUser(user: PollUserSummary): SerializedPollUser {
  return {
    id: user.id,
    email: user.email,
    full_name: user.fullName,
    is_admin: user.isAdmin,
    created_at: user.createdAt.toISOString(),
  };
}

export function serializePoll(poll: PollSnapshot): SerializedPoll {
  return {
    id: poll.id,
    title: poll.title,
    description: poll.description,
    poll_expires_at: poll.pollExpiresAt ? poll.pollExpiresAt.toISOString() : null,
    likes: poll.likes,
    dislikes: poll.dislikes,
    created_at: poll.createdAt.toISOString(),
    updated_at: poll.updatedAt ? poll.updatedAt.toISOString() : null,
    created_by: poll.createdBy,
    options: poll.options.map((option) => ({
      id: option.id,
      text: option.text,
      votes: option.votes,
    })),
    creator: poll.creator ? serializeUser(poll.creator) : null,
    liked_by: poll.likedBy.map(serializeUser),
    disliked_by: poll.dislikedBy.map(serializeUser),
  };
}

export function buildPollEvent(
  eventType: 'poll_created' | 'poll_updated',
  poll: PollSnapshot,
): PollEvent {
  return Object.freeze({
    eventType,
    payload: Object.freeze({ poll: serializePoll(poll) }),
  });
}

export function buildPollDeletedEvent(pollId: number): PollEvent {
  return Object.freeze({
    eventType: 'poll_deleted' as const,
    payload: Object.freeze({ poll_id: pollId }),
  });
}
