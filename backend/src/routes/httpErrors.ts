import type { Response } from 'express';
import type { ZodError } from 'zod';
import { isTrackerError } from '../tracker/errors';

/**
 * Map tracker failures to their status codes; anything unexpected is logged and hidden behind a 500.
 */
export function respondWithError(res: Response, err: unknown): void {
  if (isTrackerError(err)) {
    res.status(err.statusCode).json({ message: err.message, kind: err.kind });
    return;
  }

  console.error(err);
  res.status(500).json({ message: 'Server error' });
}

export function respondWithInvalidBody(res: Response, error: ZodError): void {
  const issue = error.issues[0];
  const path = issue?.path.join('.');
  const message = issue ? (path ? `Invalid ${path}: ${issue.message}` : issue.message) : 'Invalid request body';
  res.status(400).json({ message, kind: 'validation' });
}
