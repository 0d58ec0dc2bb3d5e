import { Request, Response, NextFunction } from 'express';

/**
 * Rejects plain-HTTP requests in production. The emulator does not set
 * x-forwarded-proto, so other environments pass through.
 */
export function requireHttps(req: Request, res: Response, next: NextFunction) {
  if (process.env.NODE_ENV === 'production' && req.headers['x-forwarded-proto'] !== 'https') {
    res.status(403).json({
      code: 'https_required',
      message: 'HTTPS is required',
    });
    return;
  }
  next();
}
