// Request fields set by middleware/security.ts

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export {};
