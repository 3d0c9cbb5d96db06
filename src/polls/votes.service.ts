import { Injectable } from '@nestjs/common';
import { PollAggregateService } from './poll-aggregate.service';
import { CastVoteDto } from './dto/cast-vote.dto';
import { PollView } from './interfaces/poll-snapshot.interface';
import { LogServiceErrors } from '../common/decorators/log-service-errors.decorator';

@Injectable()
export class VotesService {
  constructor(private readonly pollAggregate: PollAggregateService) {}

  @LogServiceErrors('cast_vote')
  async castVote(userId: number, castVoteDto: CastVoteDto): Promise<PollView> {
    const { poll, vote } = await this.pollAggregate.mutate(castVoteDto.pollId, userId, {
      type: 'vote',
      optionId: castVoteDto.optionId,
    });
    return { ...poll, myVoteOptionId: vote ? vote.optionId : null };
  }
}
