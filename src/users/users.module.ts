import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { AdminBootstrap } from './entities/admin-bootstrap.entity';
import { UsersService } from './users.service';

@Module({
  imports: [TypeOrmModule.forFeature([User, AdminBootstrap])],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
