import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { JwtStrategy } from './jwt.strategy';
import { UsersService } from '../../users/users.service';
import { User } from '../../users/entities/user.entity';

describe('JwtStrategy', () => {
  let strategy: JwtStrategy;
  const usersService = { findById: jest.fn() };

  beforeEach(async () => {
    usersService.findById.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        JwtStrategy,
        { provide: UsersService, useValue: usersService },
        { provide: ConfigService, useValue: new ConfigService({ jwt: { secret: 'test-secret' } }) },
      ],
    }).compile();

    strategy = moduleRef.get(JwtStrategy);
  });

  it('resolves the token subject to the current user', async () => {
    usersService.findById.mockResolvedValue(
      Object.assign(new User(), { id: 4, email: 'user4@example.com', isAdmin: true }),
    );

    await expect(strategy.validate({ sub: 4, email: 'old@example.com' })).resolves.toEqual({
      userId: 4,
      email: 'user4@example.com',
      isAdmin: true,
    });
    expect(usersService.findById).toHaveBeenCalledWith(4);
  });

  it('rejects a token whose user no longer exists', async () => {
    usersService.findById.mockResolvedValue(null);

    await expect(strategy.validate({ sub: 4, email: 'user4@example.com' })).rejects.toThrow(
      new UnauthorizedException('Could not validate credentials'),
    );
  });
});
