import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Request } from 'express';

/** Runs after JwtAuthGuard; lets only admins through. */
@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    if (!request.user || !request.user.isAdmin) {
      throw new ForbiddenException("The user doesn't have enough privileges");
    }
    return true;
  }
}
