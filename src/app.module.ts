import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { EventsModule } from './events/events.module';
import { PollsModule } from './polls/polls.module';
import { LoggerMiddleware } from './common/middleware/logger.middleware';
import databaseConfig from './config/database.config';
import jwtConfig from './config/jwt.config';
import pollsConfig from './config/polls.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [databaseConfig, jwtConfig, pollsConfig],
    }),
    DatabaseModule,
    AuthModule,
    EventsModule,
    PollsModule,
  ],
  controllers: [AppController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(LoggerMiddleware).forRoutes('*');
  }
}
