import {
  IsString,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsDate,
  ArrayMinSize,
  ArrayMaxSize,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { Expose, Type } from 'class-transformer';

export class PollOptionInputDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  text!: string;
}

export class CreatePollDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  @Expose({ name: 'poll_expires_at' })
  pollExpiresAt?: Date;

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(20)
  @ValidateNested({ each: true })
  @Type(() => PollOptionInputDto)
  options!: PollOptionInputDto[];
}
