/**
 * Error Handling Middleware
 */

import { Request, Response, NextFunction } from 'express';
import { GeneApiError } from '../utils/errors';
import { forRequest } from '../utils/logger';
import { HttpErrorBody } from '../types';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof GeneApiError && err.statusCode < 500) {
    const body: HttpErrorBody = { detail: err.message };
    res.status(err.statusCode).json(body);
    return;
  }

  forRequest(req.headers['x-request-id']).error('Unhandled error', {
    error: err.message,
    code: err instanceof GeneApiError ? err.code : undefined,
    stack: err.stack,
  });

  const body: HttpErrorBody = { detail: 'Internal server error' };
  res.status(500).json(body);
}

export function notFoundHandler(_req: Request, res: Response): void {
  const body: HttpErrorBody = { detail: 'Not Found' };
  res.status(404).json(body);
}

export default errorHandler;
