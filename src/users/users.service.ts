import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { User } from './entities/user.entity';
import { AdminBootstrap, ADMIN_BOOTSTRAP_SLOT } from './entities/admin-bootstrap.entity';

export interface CreateUserInput {
  email: string;
  fullName: string | null;
  passwordHash: string;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    private dataSource: DataSource,
  ) {}

  findByEmail(email: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { email } });
  }

  findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  /**
   * Inserts the user and, in the same transaction, tries to claim the
   * bootstrap admin slot. Only the registration whose claim lands becomes
   * admin, however many sign up concurrently.
   */
  async create(input: CreateUserInput): Promise<User> {
    return this.dataSource.transaction(async (manager) => {
      const user = await manager.save(
        manager.create(User, {
          email: input.email,
          fullName: input.fullName,
          passwordHash: input.passwordHash,
          isAdmin: false,
        }),
      );

      await manager
        .createQueryBuilder()
        .insert()
        .into(AdminBootstrap)
        .values({ slot: ADMIN_BOOTSTRAP_SLOT, userId: user.id })
        .orIgnore()
        .execute();

      const claim = await manager.findOne(AdminBootstrap, {
        where: { slot: ADMIN_BOOTSTRAP_SLOT },
      });

      if (claim && claim.userId === user.id) {
        await manager.update(User, { id: user.id }, { isAdmin: true });
        user.isAdmin = true;
        this.logger.log(`User ${user.id} claimed the bootstrap admin role`);
      }

      return user;
    });
  }
}
