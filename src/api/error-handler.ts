import { Request, Response, NextFunction } from 'express';
import logger from '@/utils/logger';
import { getCurrentTimestamp } from '@/utils/time';

export interface ErrorWithStatus extends Error {
  status?: number;
  statusCode?: number;
}

export function errorHandler(
  error: ErrorWithStatus,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(error);
  }

  logger.error('Express error handler caught error:', {
    error: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method
  });

  const statusCode = error.status || error.statusCode || 500;

  res.status(statusCode).json({
    error: {
      message: statusCode === 500 ? 'Internal Server Error' : error.message,
      status: statusCode,
      timestamp: getCurrentTimestamp(),
      path: req.path,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack })
    }
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: 'Endpoint not found',
      status: 404,
      timestamp: getCurrentTimestamp(),
      path: req.path
    }
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
