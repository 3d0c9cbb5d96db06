import { Controller, Get } from '@nestjs/common';
import { Public } from './common/decorators/public.decorator';
import { PollEventBus } from './events/poll-event-bus';

@Controller()
export class AppController {
  constructor(private readonly eventBus: PollEventBus) {}

  @Public()
  @Get('health')
  health() {
    return {
      status: 'ok',
      subscribers: this.eventBus.subscriberCount,
    };
  }
}
