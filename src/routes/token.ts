// POST /token: exchanges form-encoded username/password for a bearer token
import { Router, Response, NextFunction, Request } from 'express';
import { z } from 'zod';
import type { BearerTokenAuthenticator } from '../auth/authenticators';
import type { Logger } from '../logger';
import { parseBody } from '../utils/validation';

const loginFormSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export function createTokenRouter(authenticator: BearerTokenAuthenticator, logger: Logger): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { username, password } = parseBody(loginFormSchema, req.body, 'Invalid login form');
      const principal = await authenticator.resolve({ kind: 'password', username, password });
      const issued = await authenticator.tokens.issue(principal);

      logger.info({ user: principal.username, expiresAt: issued.expiresAt.toISOString() }, 'Access token issued');
      res.set('Cache-Control', 'no-store').status(200).json({
        access_token: issued.token,
        token_type: 'bearer',
        expires_in: issued.expiresIn,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
