import type { ErrorRequestHandler } from 'express';
import multer from 'multer';

import { describeError, type Logger } from '../config/logger';
import { AppError, getStatus, ValidationError } from '../util/errors';

type ErrorBody = {
  error: {
    code: string;
    message: string;
    issues?: { path?: string; message: string }[];
  };
};

const toResponse = (error: unknown): { status: number; body: ErrorBody } => {
  if (error instanceof ValidationError) {
    return {
      status: error.status,
      body: { error: { code: error.code, message: error.message, issues: error.issues } },
    };
  }

  if (error instanceof AppError) {
    return { status: error.status, body: { error: { code: error.code, message: error.message } } };
  }

  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE'
      ? { status: 413, body: { error: { code: 'file_too_large', message: error.message } } }
      : { status: 400, body: { error: { code: 'upload_failed', message: `${error.message} (${error.field ?? 'unknown field'})` } } };
  }

  // body-parser marks malformed JSON as a 400 SyntaxError.
  if (error instanceof SyntaxError && getStatus(error) === 400) {
    return { status: 400, body: { error: { code: 'validation_failed', message: 'Malformed JSON body.' } } };
  }

  return { status: 500, body: { error: { code: 'internal_error', message: 'Internal server error.' } } };
};

export const createErrorHandler = (logger: Logger): ErrorRequestHandler =>
  (error: unknown, req, res, _next) => {
    const { status, body } = toResponse(error);

    if (status >= 500) {
      logger.error('http.request.failed', {
        method: req.method,
        path: req.originalUrl,
        status,
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else {
      logger.warn('http.request.rejected', {
        method: req.method,
        path: req.originalUrl,
        status,
        code: body.error.code,
      });
    }

    res.status(status).json(body);
  };
