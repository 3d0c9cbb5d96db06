import { registerAs } from '@nestjs/config';

export default registerAs('jwt', () => ({
  secret: process.env.JWT_SECRET || 'change-me',
  expiresIn: parseInt(process.env.JWT_EXPIRES_IN || '1800', 10),
}));
