import type { Account } from '../db/types';

// Fields requireAuth attaches to an Express request
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      account?: Account;
      sessionToken?: string;
    }
  }
}

export {};
