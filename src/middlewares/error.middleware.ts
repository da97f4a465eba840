import { Request, Response, NextFunction } from "express";
import { AppError, UpstreamError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError &&
  "type" in err &&
  err.type === "entity.parse.failed";

const isClientHttpError = (err: unknown): err is Error & { status: number } =>
  err instanceof Error &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500;

export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof UpstreamError) {
    logger.error(`Upstream ${err.service} failure on ${req.method} ${req.originalUrl}: ${err.detail}`);
    return sendError(res, err.message, err.status);
  }

  if (err instanceof AppError) {
    logger.warn(`${err.name} on ${req.method} ${req.originalUrl}: ${err.message}`);
    return sendError(res, err.message, err.status);
  }

  if (isBodyParseError(err)) {
    return sendError(res, "Request body must be valid JSON", 400);
  }

  // body-parser rejections (too large, bad charset) carry their own 4xx
  if (isClientHttpError(err)) {
    logger.warn(`Rejected ${req.method} ${req.originalUrl}: ${err.message}`);
    return sendError(res, err.message, err.status);
  }

  logger.error("Unhandled error", err);
  return sendError(res, "Internal Server Error", 500);
}
