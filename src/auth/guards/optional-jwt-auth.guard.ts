import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * Attaches the user when a valid bearer token is present; anonymous and
 * invalid-token requests pass through without one.
 */
@Injectable()
export class OptionalJwtAuthGuard extends AuthGuard('jwt') {
  handleRequest<TUser = Express.User>(_err: unknown, user: TUser): TUser {
    return user;
  }
}
