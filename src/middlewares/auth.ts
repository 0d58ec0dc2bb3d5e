import { Request, Response, NextFunction } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';

export interface AuthRequest extends Request {
  user?: admin.auth.DecodedIdToken;
}

/**
 * Verifies the Firebase ID token in the Authorization header and attaches
 * the decoded token to the request.
 */
export async function requireAuth(
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({
      code: 'unauthorized',
      message: 'Missing or invalid authorization header',
    });
    return;
  }

  try {
    const idToken = authHeader.slice('Bearer '.length);
    req.user = await admin.auth().verifyIdToken(idToken);
  } catch (error) {
    functions.logger.warn('[auth] Token verification failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(401).json({
      code: 'unauthorized',
      message: 'Invalid or expired token',
    });
    return;
  }

  next();
}

/**
 * The signed-in user's id. Only valid behind `requireAuth`.
 */
export function authenticatedUserId(req: AuthRequest): string | null {
  return req.user?.uid ?? null;
}
