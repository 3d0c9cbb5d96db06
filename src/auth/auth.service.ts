import { ConflictException, Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { UsersService } from '../users/users.service';
import { User } from '../users/entities/user.entity';
import { RegisterDto } from './dto/register.dto';
import { JwtPayload } from './interfaces/auth-user.interface';
import { LogServiceErrors } from '../common/decorators/log-service-errors.decorator';

const BCRYPT_ROUNDS = 10;

export interface PublicUser {
  id: number;
  email: string;
  fullName: string | null;
  isAdmin: boolean;
  createdAt: Date;
}

export interface AccessToken {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    isAdmin: user.isAdmin,
    createdAt: user.createdAt,
  };
}

@Injectable()
export class AuthService {
  constructor(
    private jwtService: JwtService,
    private configService: ConfigService,
    private usersService: UsersService,
  ) {}

  @LogServiceErrors('register')
  async register(registerDto: RegisterDto): Promise<PublicUser> {
    const existing = await this.usersService.findByEmail(registerDto.email);
    if (existing) {
      throw new ConflictException('Email already registered');
    }

    const passwordHash = await bcrypt.hash(registerDto.password, BCRYPT_ROUNDS);
    const user = await this.usersService.create({
      email: registerDto.email,
      fullName: registerDto.fullName ?? null,
      passwordHash,
    });
    return toPublicUser(user);
  }

  async validateUser(email: string, password: string): Promise<User | null> {
    const user = await this.usersService.findByEmail(email);
    if (!user) {
      return null;
    }
    const valid = await bcrypt.compare(password, user.passwordHash);
    return valid ? user : null;
  }

  @LogServiceErrors('login')
  async login(email: string, password: string): Promise<AccessToken & { user: PublicUser }> {
    const user = await this.validateUser(email, password);
    if (!user) {
      throw new UnauthorizedException(
        'Invalid email or password. Please check your credentials and try again.',
      );
    }
    return { ...this.issueToken(user.id, user.email), user: toPublicUser(user) };
  }

  async profile(userId: number): Promise<PublicUser> {
    const user = await this.usersService.findById(userId);
    if (!user) {
      throw new UnauthorizedException('Could not validate credentials');
    }
    return toPublicUser(user);
  }

  async refresh(userId: number): Promise<AccessToken & { user: PublicUser }> {
    const user = await this.profile(userId);
    return { ...this.issueToken(user.id, user.email), user };
  }

  issueToken(userId: number, email: string): AccessToken {
    const payload: JwtPayload = { sub: userId, email };
    return {
      accessToken: this.jwtService.sign(payload),
      tokenType: 'bearer',
      expiresIn: this.configService.get<number>('jwt.expiresIn') ?? 1800,
    };
  }
}
