import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { logger, MboxError, type MboxErrorCode } from '@mbox-search/mbox-core';

const STATUS_BY_CODE: Record<MboxErrorCode, number> = {
  IO_FAILURE: 404,
  MALFORMED_MESSAGE: 400,
  NO_INDEX_LOADED: 409,
  SESSION_NOT_FOUND: 404,
  MESSAGE_NOT_FOUND: 404,
  INVALID_STATE: 409,
};

/** Thrown by route handlers for bad requests that are not core errors */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void {
  if (err instanceof MboxError) {
    const status = STATUS_BY_CODE[err.code];
    logger.warn(`${req.method} ${req.originalUrl} -> ${status}: ${err.message}`);
    res.status(status).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof ZodError) {
    const message = err.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
    res.status(400).json({ error: message, code: 'BAD_REQUEST' });
    return;
  }

  if (err instanceof multer.MulterError || err instanceof BadRequestError) {
    res.status(400).json({ error: err.message, code: 'BAD_REQUEST' });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  logger.error(`${req.method} ${req.originalUrl} failed: ${message}`, {
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL' });
}
