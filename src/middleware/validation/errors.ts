import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { errorMessage } from '../../lib/stageResult';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

/**
 * Service error codes (thrown as `new Error(CODE)` or `new Error(`${CODE}: detail`)`)
 * mapped to HTTP responses
 */
export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

function errorCode(error: Error): string {
  return error.message.split(':')[0].trim();
}

/**
 * Higher-order function to create async error handling middleware
 * Catches errors from async route handlers and maps them to HTTP responses
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const mapper = error instanceof Error && errorMap ? errorMap[errorCode(error)] : undefined;
      if (error instanceof Error && mapper) {
        const mapped = mapper(error);
        res.status(mapped.status).json(mapped.body);
        return;
      }

      console.error(error);
      res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && { details: errorMessage(error) })
      });
    }
  };
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(status: number, message: string, details?: unknown): ErrorResponse {
  return { status, body: { error: message, ...(details !== undefined && { details }) } };
}

export const forecastingErrorMap: ErrorHandlerMap = {
  INVALID_HORIZON_DAYS: () => createErrorResponse(400, 'horizonDays must be an integer between 1 and 365.'),
  INVALID_ISO_DATE: (error) => createErrorResponse(400, 'Dates must be formatted YYYY-MM-DD.', error.message)
};
