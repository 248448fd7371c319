import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import {
  ExportIOError,
  InvalidDimensionError,
  InvalidPaddingError,
  SessionNotFoundError,
} from '../errors/slicing.errors';

/**
 * Thrown by route handlers for malformed request bodies
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof multer.MulterError) {
    console.error(`[Slicing] Upload error on ${req.method} ${req.path}: ${err.code}`);
    res.status(400).json({
      error: 'File upload error',
      message: err.message,
      code: err.code,
      field: err.field,
    });
    return;
  }

  if (err instanceof SessionNotFoundError) {
    res.status(404).json({ error: err.kind, message: err.message });
    return;
  }

  if (err instanceof InvalidDimensionError || err instanceof InvalidPaddingError) {
    res.status(400).json({ error: err.kind, message: err.message });
    return;
  }

  if (err instanceof BadRequestError) {
    res.status(400).json({ error: 'Bad Request', message: err.message });
    return;
  }

  if (err instanceof ExportIOError) {
    console.error(`[Slicing] Export ${err.exportKind} to ${err.destination} failed:`, err.cause);
    res.status(500).json({
      error: err.kind,
      message: err.message,
      exportKind: err.exportKind,
      destination: err.destination,
    });
    return;
  }

  console.error('Error occurred:', err);
  res.status(500).json({
    error: 'Internal Server Error',
    message: err instanceof Error ? err.message : String(err),
  });
}
