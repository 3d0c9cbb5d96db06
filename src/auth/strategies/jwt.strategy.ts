import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { UsersService } from '../../users/users.service';
import { AuthUser, JwtPayload } from '../interfaces/auth-user.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get<string>('jwt.secret') || 'change-me',
    });
  }

  async validate(payload: JwtPayload): Promise<AuthUser> {
    if (!payload || typeof payload.sub !== 'number') {
      throw new UnauthorizedException('Invalid token');
    }

    // Tokens outlive accounts; always resolve the user again
    const user = await this.usersService.findById(payload.sub);
    if (!user) {
      throw new UnauthorizedException('Could not validate credentials');
    }

    return {
      userId: user.id,
      email: user.email,
      isAdmin: user.isAdmin,
    };
  }
}
