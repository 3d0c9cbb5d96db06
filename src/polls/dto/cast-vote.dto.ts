import { IsInt, Min } from 'class-validator';
import { Expose, Type } from 'class-transformer';

export class CastVoteDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Expose({ name: 'poll_id' })
  pollId!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Expose({ name: 'option_id' })
  optionId!: number;
}
