import type { Request, Response, NextFunction } from 'express';
import { logger, errMessage } from '@/services/logger';
import { ItineraryValidationError } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ItineraryValidationError) {
    res.status(400).json(createErrorResponse(err.message, err.issues, 'validation_error'));
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json(createErrorResponse('Request body is not valid JSON', undefined, 'invalid_json'));
    return;
  }

  logger.error('Unhandled error', {
    path: req.originalUrl,
    correlationId: res.locals.correlationId,
    error: errMessage(err),
  });
  res.status(500).json(createErrorResponse(`Internal Server Error: ${errMessage(err)}`, undefined, 'internal_error'));
}
