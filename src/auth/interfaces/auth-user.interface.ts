declare global {
  namespace Express {
    interface User {
      userId: number;
      email: string;
      isAdmin: boolean;
    }
  }
}

export type AuthUser = Express.User;

export interface JwtPayload {
  sub: number;
  email: string;
}
