import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Poll } from './entities/poll.entity';
import { PollOption } from './entities/poll-option.entity';
import { PollLike } from './entities/poll-like.entity';
import { PollDislike } from './entities/poll-dislike.entity';
import { PollVote } from './entities/poll-vote.entity';
import { PollStore } from './persistence/poll.store';
import { TypeOrmPollStore } from './persistence/typeorm-poll.store';
import { CounterSyncService } from './counter-sync.service';
import { PollAggregateService } from './poll-aggregate.service';
import { PollsService } from './polls.service';
import { VotesService } from './votes.service';
import { PollsController } from './polls.controller';
import { VotesController } from './votes.controller';
import { PollsGateway } from './polls.gateway';
import { AuthModule } from '../auth/auth.module';
import { EventsModule } from '../events/events.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Poll, PollOption, PollLike, PollDislike, PollVote]),
    AuthModule,
    EventsModule,
  ],
  controllers: [PollsController, VotesController],
  providers: [
    { provide: PollStore, useClass: TypeOrmPollStore },
    CounterSyncService,
    PollAggregateService,
    PollsService,
    VotesService,
    PollsGateway,
  ],
  exports: [PollsService, PollAggregateService],
})
export class PollsModule {}
