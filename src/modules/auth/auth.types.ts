import { Request } from 'express';
import { User } from '../../entities/user.entity';

export interface AuthenticatedRequest extends Request {
  user?: User;
  sessionToken?: string;
}

export interface SessionGrant {
  token: string;
  expiresAt: Date;
  user: { id: string; username: string };
}
