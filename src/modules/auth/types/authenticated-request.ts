import type { Request } from 'express';
import { Principal } from '../../../domain/users';

export interface AuthenticatedRequest extends Request {
  /** Set by JwtAuthGuard */
  user?: Principal;
}
