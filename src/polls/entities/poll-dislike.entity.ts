import { Entity, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Poll } from './poll.entity';
import { User } from '../../users/entities/user.entity';

@Entity('poll_dislikes')
export class PollDislike {
  @PrimaryColumn({ name: 'user_id', type: 'int' })
  userId!: number;

  @PrimaryColumn({ name: 'poll_id', type: 'int' })
  pollId!: number;

  // Relations
  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user!: User;

  @ManyToOne(() => Poll, (poll) => poll.dislikeRows, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'poll_id' })
  poll!: Poll;
}
