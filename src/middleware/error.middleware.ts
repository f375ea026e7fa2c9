import { Request, Response, NextFunction } from 'express';

function statusCodeOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return 500;
}

export const errorMiddleware = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const message = err instanceof Error ? err.message : 'An unexpected error occurred';

  // 1. Log the error for the developer
  console.error(`[Error] ${req.method} ${req.path}:`, message);

  // 2. Determine the status code (body-parser errors carry one, e.g. 400 for malformed JSON)
  const statusCode = statusCodeOf(err);

  // 3. Send the response
  res.status(statusCode).json({
    success: false,
    message,
    // In development, send the stack trace to help debug
    ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack }),
  });
};
