import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { User } from '../../users/entities/user.entity';
import { PollOption } from './poll-option.entity';
import { PollLike } from './poll-like.entity';
import { PollDislike } from './poll-dislike.entity';
import { PollVote } from './poll-vote.entity';

@Entity('polls')
@Index('idx_polls_created_by', ['createdBy'])
export class Poll {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  // Derived from poll_likes / poll_dislikes; only the counter sync writes these
  @Column({ type: 'int', default: 0 })
  likes!: number;

  @Column({ type: 'int', default: 0 })
  dislikes!: number;

  @Column({ name: 'poll_expires_at', type: 'datetime', nullable: true })
  pollExpiresAt!: Date | null;

  @Column({ name: 'created_by', type: 'int', nullable: true })
  createdBy!: number | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', nullable: true })
  updatedAt!: Date | null;

  // Relations
  @ManyToOne(() => User, (user) => user.createdPolls, { onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by' })
  creator!: User | null;

  @OneToMany(() => PollOption, (option) => option.poll, { cascade: true })
  options!: PollOption[];

  @OneToMany(() => PollLike, (like) => like.poll)
  likeRows!: PollLike[];

  @OneToMany(() => PollDislike, (dislike) => dislike.poll)
  dislikeRows!: PollDislike[];

  @OneToMany(() => PollVote, (vote) => vote.poll)
  votes!: PollVote[];
}
