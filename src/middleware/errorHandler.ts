import { Request, Response, NextFunction } from 'express';
import { AppError } from '@/utils/errors';
import { logger } from '@/utils/logger';

interface IError extends Error {
  statusCode?: number;
  code?: string | number;
  errors?: Record<string, { message: string }>; // Mongoose validation errors
}

interface ErrorBody {
  statusCode: number;
  code: string;
  message: string;
}

const toErrorBody = (err: IError): ErrorBody => {
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, code: err.code, message: err.message };
  }

  // Mongoose bad cast, e.g. a malformed date in a filter
  if (err.name === 'CastError') {
    return { statusCode: 400, code: 'VALIDATION_ERROR', message: 'Invalid query value' };
  }

  // Mongoose validation error
  if (err.name === 'ValidationError' && err.errors) {
    const message = Object.values(err.errors).map(val => val.message).join(', ');
    return { statusCode: 400, code: 'VALIDATION_ERROR', message };
  }

  // Malformed JSON body from express.json()
  if (err.statusCode && err.statusCode < 500) {
    return { statusCode: err.statusCode, code: 'BAD_REQUEST', message: err.message };
  }

  return { statusCode: 500, code: 'SERVER_ERROR', message: 'Server Error' };
};

export const errorHandler = (err: IError, req: Request, res: Response, next: NextFunction) => {
  const body = toErrorBody(err);

  if (body.statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed: ${err.message}`, { stack: err.stack });
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(body.statusCode).json({
    success: false,
    error: {
      code: body.code,
      message: body.message,
    },
  });
};
