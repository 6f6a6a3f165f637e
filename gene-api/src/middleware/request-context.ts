import { Request, Response, NextFunction } from 'express';
import { forRequest } from '../utils/logger';

export function requestId(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const id = (Array.isArray(header) ? header[0] : header) ||
    `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  req.headers['x-request-id'] = id;
  res.setHeader('X-Request-ID', id);
  next();
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  res.on('finish', () => {
    forRequest(req.headers['x-request-id']).info(`${req.method} ${req.path}`, {
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });
  next();
}
