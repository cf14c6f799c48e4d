import type { Request, Response, NextFunction, RequestHandler } from 'express';

// Guards the write paths (collection triggers). Reads stay open; no key configured = open.
export function requireApiKey(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) return next();
    const headerKey = req.header('x-api-key');
    if (!headerKey || headerKey !== apiKey) {
      res.status(401).json({
        error: { code: 'AUTH_REQUIRED', message: 'invalid or missing x-api-key' }
      });
      return;
    }
    next();
  };
}
