import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { Expose, Type } from 'class-transformer';
import { PollSortKey } from '../interfaces/poll-snapshot.interface';

export const POLL_SORT_KEYS: PollSortKey[] = ['created_at', 'likes'];

export class ListPollsDto {
  @IsOptional()
  @IsIn(POLL_SORT_KEYS)
  @Expose({ name: 'sort_by' })
  sortBy?: PollSortKey = 'created_at';

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number = 50;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number = 0;
}
