import { NextFunction, Request, Response } from 'express';
import { BoosterError } from '../errors/BoosterErrors';
import logger from '../utils/logger';

export const sendError = (res: Response, err: unknown, context: string) => {
  if (err instanceof BoosterError) {
    logger.warn(`[API] ${context}: ${err.message}`, { code: err.code });
    res.status(err.httpStatus).json({ error: err.message, code: err.code });
    return;
  }
  logger.error(`[API] ${context}`, { error: err });
  res.status(500).json({ error: err instanceof Error ? err.message : 'Internal error' });
};

// Malformed JSON bodies surface here from express.json()
export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_REQUEST' });
    return;
  }
  sendError(res, err, 'Unhandled error');
};
