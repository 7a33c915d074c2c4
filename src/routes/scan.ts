// POST /scan: authenticated relay to the AI scanning API
import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AuthenticatedRequest, AuthScheme } from '../auth/types';
import { requirePrincipal } from '../middleware/authGate';
import type { ScanProxy } from '../services/scanProxy';
import { parseBody } from '../utils/validation';

// Header-key callers may send any JSON object; token callers must follow the typed contract
const looseScanRequestSchema = z.record(z.unknown());

const strictScanRequestSchema = z
  .object({
    code: z.string(),
    language: z.string(),
    options: z.record(z.unknown()).optional(),
  })
  .passthrough();

export function scanRequestSchemaFor(scheme: AuthScheme) {
  return scheme === 'bearer' ? strictScanRequestSchema : looseScanRequestSchema;
}

export function createScanRouter(proxy: ScanProxy, scheme: AuthScheme): Router {
  const router = Router();
  const schema = scanRequestSchemaFor(scheme);

  router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    const controller = new AbortController();
    const abortOnDisconnect = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', abortOnDisconnect);

    try {
      const principal = requirePrincipal(req);
      parseBody(schema, req.body, 'Invalid scan request');
      // The inbound payload is forwarded as received, not the parsed copy
      const payload: Record<string, unknown> = req.body;

      const response = await proxy.handle(payload, principal, { signal: controller.signal });
      res.status(200).json(response);
    } catch (err) {
      next(err);
    } finally {
      res.off('close', abortOnDisconnect);
    }
  });

  return router;
}
