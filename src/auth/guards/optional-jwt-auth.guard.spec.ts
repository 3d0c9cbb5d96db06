import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { OptionalJwtAuthGuard } from './optional-jwt-auth.guard';
import { JwtStrategy } from '../strategies/jwt.strategy';
import { UsersService } from '../../users/users.service';
import { User } from '../../users/entities/user.entity';

interface FakeRequest {
  headers: Record<string, string>;
  user?: unknown;
}

function httpContext(authorization?: string) {
  const request: FakeRequest = { headers: authorization ? { authorization } : {} };
  return { request, context: new ExecutionContextHost([request, {}, () => undefined]) };
}

describe('OptionalJwtAuthGuard', () => {
  let guard: OptionalJwtAuthGuard;
  const usersService = { findById: jest.fn() };
  const signer = new JwtService({ secret: 'test-secret' });

  beforeEach(async () => {
    usersService.findById.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        OptionalJwtAuthGuard,
        JwtStrategy,
        { provide: UsersService, useValue: usersService },
        { provide: ConfigService, useValue: new ConfigService({ jwt: { secret: 'test-secret' } }) },
      ],
    }).compile();

    guard = moduleRef.get(OptionalJwtAuthGuard);
  });

  it('attaches the user for a valid token', async () => {
    usersService.findById.mockResolvedValue(
      Object.assign(new User(), { id: 2, email: 'user2@example.com', isAdmin: false }),
    );
    const { request, context } = httpContext(
      `Bearer ${signer.sign({ sub: 2, email: 'user2@example.com' })}`,
    );

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(request.user).toEqual({ userId: 2, email: 'user2@example.com', isAdmin: false });
  });

  it('lets anonymous requests through without a user', async () => {
    const { request, context } = httpContext();

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(request.user).toBe(false);
  });

  it('lets a token signed with another secret through without a user', async () => {
    const forged = new JwtService({ secret: 'other-secret' }).sign({ sub: 2, email: 'user2@example.com' });
    const { request, context } = httpContext(`Bearer ${forged}`);

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(request.user).toBe(false);
    expect(usersService.findById).not.toHaveBeenCalled();
  });

  it('lets a token of a deleted user through without a user', async () => {
    usersService.findById.mockResolvedValue(null);
    const { request, context } = httpContext(
      `Bearer ${signer.sign({ sub: 9, email: 'gone@example.com' })}`,
    );

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(request.user).toBeFalsy();
  });

  it('passes through whatever passport resolved, errors included', () => {
    expect(guard.handleRequest(new Error('jwt malformed'), false)).toBe(false);
  });
});
