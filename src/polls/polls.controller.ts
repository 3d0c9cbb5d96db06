import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  MessageEvent,
  Param,
  ParseIntPipe,
  Post,
  Sse,
  UseGuards,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { PollsService } from './polls.service';
import { CreatePollDto } from './dto/create-poll.dto';
import { ListPollsDto } from './dto/list-polls.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { OptionalJwtAuthGuard } from '../auth/guards/optional-jwt-auth.guard';
import { AuthUser } from '../auth/interfaces/auth-user.interface';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Public } from '../common/decorators/public.decorator';
import { RawResponse } from '../common/decorators/raw-response.decorator';
import { PollEventBus } from '../events/poll-event-bus';
import { streamPollEvents } from '../events/poll-event-stream';

@Controller('polls')
@UseGuards(JwtAuthGuard)
export class PollsController {
  constructor(
    private readonly pollsService: PollsService,
    private readonly eventBus: PollEventBus,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  create(@Body() createPollDto: CreatePollDto, @CurrentUser() user: AuthUser) {
    return this.pollsService.createPoll(user.userId, createPollDto);
  }

  @Public()
  @UseGuards(OptionalJwtAuthGuard)
  @Post('list')
  @HttpCode(HttpStatus.OK)
  list(@Body() listPollsDto: ListPollsDto, @CurrentUser() user?: AuthUser) {
    return this.pollsService.listPolls(listPollsDto, user?.userId);
  }

  @Post('mine')
  @HttpCode(HttpStatus.OK)
  mine(@Body() listPollsDto: ListPollsDto, @CurrentUser() user: AuthUser) {
    return this.pollsService.listPollsByUser(user.userId, listPollsDto);
  }

  // Declared before ':id' so the literal path wins
  @Public()
  @RawResponse()
  @Sse('stream')
  stream(): Observable<MessageEvent> {
    return streamPollEvents(this.eventBus);
  }

  @Public()
  @UseGuards(OptionalJwtAuthGuard)
  @Get(':id')
  show(@Param('id', ParseIntPipe) id: number, @CurrentUser() user?: AuthUser) {
    return this.pollsService.getPoll(id, user?.userId);
  }

  @Post(':id/like')
  @HttpCode(HttpStatus.OK)
  like(@Param('id', ParseIntPipe) id: number, @CurrentUser() user: AuthUser) {
    return this.pollsService.likePoll(id, user.userId);
  }

  @Post(':id/dislike')
  @HttpCode(HttpStatus.OK)
  dislike(@Param('id', ParseIntPipe) id: number, @CurrentUser() user: AuthUser) {
    return this.pollsService.dislikePoll(id, user.userId);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number, @CurrentUser() user: AuthUser) {
    return this.pollsService.deletePoll(id, user);
  }
}
