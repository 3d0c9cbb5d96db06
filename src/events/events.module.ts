import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PollEventBus } from './poll-event-bus';

@Module({
  providers: [
    {
      provide: PollEventBus,
      useFactory: (configService: ConfigService) =>
        new PollEventBus({
          maxQueueSize: configService.get<number>('polls.eventQueueSize'),
        }),
      inject: [ConfigService],
    },
  ],
  exports: [PollEventBus],
})
export class EventsModule {}
