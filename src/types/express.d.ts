declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      isAdmin?: boolean;
    }
  }
}

export {};
