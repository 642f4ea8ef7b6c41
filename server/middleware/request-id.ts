import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

/**
 * Middleware to add a request ID to each request
 * Reuses an incoming X-Request-ID so helpdesk and gateway logs can be joined
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header('X-Request-ID')?.trim();
  req.id = incoming && incoming.length <= 128 ? incoming : randomUUID();

  res.setHeader('X-Request-ID', req.id);

  next();
}
