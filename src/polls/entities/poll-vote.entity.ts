import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
  Unique,
} from 'typeorm';
import { Poll } from './poll.entity';
import { PollOption } from './poll-option.entity';
import { User } from '../../users/entities/user.entity';

@Entity('poll_votes')
@Unique('uq_poll_vote_user_per_poll', ['userId', 'pollId'])
@Index('idx_poll_votes_option', ['optionId'])
export class PollVote {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'int' })
  userId!: number;

  @Column({ name: 'poll_id', type: 'int' })
  pollId!: number;

  @Column({ name: 'option_id', type: 'int' })
  optionId!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  // Relations
  @ManyToOne(() => Poll, (poll) => poll.votes, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'poll_id' })
  poll!: Poll;

  @ManyToOne(() => PollOption, (option) => option.voteRows, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'option_id' })
  option!: PollOption;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user!: User;
}
