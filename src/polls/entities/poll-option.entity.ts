import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
} from 'typeorm';
import { Poll } from './poll.entity';
import { PollVote } from './poll-vote.entity';

@Entity('poll_options')
export class PollOption {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'poll_id', type: 'int' })
  pollId!: number;

  @Column({ type: 'varchar', length: 255 })
  text!: string;

  // Derived from poll_votes
  @Column({ type: 'int', default: 0 })
  votes!: number;

  // Relations
  @ManyToOne(() => Poll, (poll) => poll.options, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'poll_id' })
  poll!: Poll;

  @OneToMany(() => PollVote, (vote) => vote.option)
  voteRows!: PollVote[];
}
