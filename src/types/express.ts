// Request fields set by our own middleware

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export {};
