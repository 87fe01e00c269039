import { AuthenticatedSession } from '../models/Session';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
      principal?: AuthenticatedSession;
    }
  }
}

export {};
