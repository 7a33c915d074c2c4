// Resolves the request's credential to a principal before any protected route runs
import { Response, NextFunction, RequestHandler } from 'express';
import type { AuthenticatedRequest, Authenticator, Principal } from '../auth/types';
import type { Logger } from '../logger';

export function authGate(authenticator: Authenticator, logger: Logger): RequestHandler {
  return async (req: AuthenticatedRequest, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const credential = authenticator.extractCredential(req);
      if (!credential) {
        logger.warn({ scheme: authenticator.scheme, path: req.path }, 'Request without credential');
        throw authenticator.missingCredential();
      }
      req.principal = await authenticator.resolve(credential);
      next();
    } catch (err) {
      next(err);
    }
  };
}

// Only valid behind authGate; anything else is a wiring mistake.
export function requirePrincipal(req: AuthenticatedRequest): Principal {
  if (!req.principal) {
    throw new Error('authGate must run before this handler');
  }
  return req.principal;
}
