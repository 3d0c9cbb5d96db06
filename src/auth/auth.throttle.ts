import { ThrottlerModuleOptions } from '@nestjs/throttler';

// Login attempts per client IP: 5 per 5 minutes
export const LOGIN_THROTTLE = { default: { limit: 5, ttl: 300000 } };

export const AUTH_THROTTLERS: ThrottlerModuleOptions = [{ name: 'default', ...LOGIN_THROTTLE.default }];
