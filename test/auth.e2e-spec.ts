import { INestApplication, Logger, UnauthorizedException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ThrottlerModule } from '@nestjs/throttler';
import request from 'supertest';
import { configureApp } from '../src/app.setup';
import { AuthController } from '../src/auth/auth.controller';
import { AuthService } from '../src/auth/auth.service';
import { AUTH_THROTTLERS } from '../src/auth/auth.throttle';
import { JwtAuthGuard } from '../src/auth/guards/jwt-auth.guard';
import { HeaderAuthGuard } from './support/header-auth.guard';

const profile = {
  id: 1,
  email: 'user1@example.com',
  fullName: null,
  isAdmin: true,
  createdAt: new Date('2026-01-01T00:00:00.000Z'),
};

describe('Auth API (e2e)', () => {
  let app: INestApplication;
  const authService = {
    login: jest.fn(),
    profile: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    authService.login.mockRejectedValue(
      new UnauthorizedException('Invalid email or password. Please check your credentials and try again.'),
    );
    authService.profile.mockResolvedValue(profile);

    const moduleRef = await Test.createTestingModule({
      imports: [ThrottlerModule.forRoot(AUTH_THROTTLERS)],
      controllers: [AuthController],
      providers: [{ provide: AuthService, useValue: authService }],
    })
      .overrideGuard(JwtAuthGuard)
      .useValue(new HeaderAuthGuard(false))
      .compile();

    app = moduleRef.createNestApplication();
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  const login = () =>
    request(app.getHttpServer())
      .post('/api/auth/login')
      .send({ email: 'user1@example.com', password: 'wrong-password' });

  it('answers 429 after five login attempts', async () => {
    for (let attempt = 0; attempt < 5; attempt++) {
      await login().expect(401);
    }

    const res = await login().expect(429);

    expect(res.body.status).toBe(false);
    expect(res.body.code).toBe(429);
    expect(res.body.payload).toBeNull();
    expect(authService.login).toHaveBeenCalledTimes(5);
  });

  it('does not limit other auth routes', async () => {
    for (let attempt = 0; attempt < 7; attempt++) {
      await request(app.getHttpServer()).get('/api/auth/me').set('x-test-user', '1').expect(200);
    }
  });

  it('serves the admin profile to admins only', async () => {
    const denied = await request(app.getHttpServer())
      .get('/api/auth/admin/me')
      .set('x-test-user', '2')
      .expect(403);
    expect(denied.body.message).toBe("The user doesn't have enough privileges");

    const allowed = await request(app.getHttpServer())
      .get('/api/auth/admin/me')
      .set('x-test-user', '1')
      .set('x-test-admin', 'true')
      .expect(200);
    expect(allowed.body.payload).toEqual({
      id: 1,
      email: 'user1@example.com',
      full_name: null,
      is_admin: true,
      created_at: '2026-01-01T00:00:00.000Z',
    });
    expect(authService.profile).toHaveBeenCalledWith(1);
  });
});
