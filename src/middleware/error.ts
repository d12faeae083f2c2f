import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { Logger } from '../logger.js';

export function errorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      return res.status(400).json({ error: 'ValidationError', issues: err.flatten() });
    }
    if (err instanceof SyntaxError && 'body' in err) {
      return res.status(400).json({ error: 'MalformedJson' });
    }
    logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    return res.status(500).json({ error: 'InternalServerError' });
  };
}
