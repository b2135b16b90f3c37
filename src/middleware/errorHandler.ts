//src/middleware/errorHandler.ts
import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { handleError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";

export function notFound(req: Request, res: Response) {
  return res.status(404).json({ message: `Route not found: ${req.method} ${req.path}`, requestId: req.id });
}

// express recognises error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const appError = handleError(err instanceof multer.MulterError ? new ValidationError(err.message) : err);

  if (appError.isOperational) {
    logger.warn(appError.message, { requestId: req.id, status: appError.statusCode, path: req.path });
  } else {
    logger.error(appError.message, {
      requestId: req.id,
      path: req.path,
      stack: err instanceof Error ? err.stack : undefined,
    });
  }

  const message = appError.isOperational ? appError.message : "Internal server error";
  return res.status(appError.statusCode).json({ message, requestId: req.id });
}
