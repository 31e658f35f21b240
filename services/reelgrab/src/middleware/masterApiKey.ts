import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

function sameKey(incoming: string, expected: string): boolean {
  const a = Buffer.from(incoming);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Operator gate for the front-end. An empty key leaves the API open. */
export function createMasterApiKeyMiddleware(masterApiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!masterApiKey) {
      next();
      return;
    }

    if (!sameKey(req.header('x-api-key') || '', masterApiKey)) {
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid x-api-key',
        },
      });
      return;
    }

    next();
  };
}
