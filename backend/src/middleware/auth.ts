import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Bearer-token guard. EventSource cannot send headers, so a `token` query
 * parameter is accepted as well. No token configured means open access.
 */
export function requireToken(expected: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) return next();
    const authHeader = req.header('authorization') || '';
    const bearer = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : '';
    const token = bearer || (typeof req.query.token === 'string' ? req.query.token : '');
    if (token && token === expected) return next();
    return res.status(401).json({ error: 'Unauthorized' });
  };
}
