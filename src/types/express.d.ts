import type { Principal } from '../auth/auth-context.js';

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}
