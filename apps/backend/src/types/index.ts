export const ROLES = ['User', 'Admin'] as const;

export type Role = typeof ROLES[number];

export interface AuthenticatedUser {
  userId: string;
  role: Role;
}

// Extend the Express Request type
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
      correlationId?: string;
    }
  }
}
