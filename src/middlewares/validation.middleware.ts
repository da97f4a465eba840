import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import { AppConfig } from "../configs/environment";
import { sendError } from "../utils/response";

export const createRateLimiter = (config: AppConfig) =>
  rateLimit({
    windowMs: config.api.rateLimit.windowMs,
    limit: config.api.rateLimit.max,
    message: {
      success: false,
      error: "Rate limit exceeded. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

/**
 * POST bodies must be JSON. Empty bodies pass; endpoints without input
 * accept them.
 */
export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const hasBody = Number(req.headers["content-length"] || 0) > 0;
  if ((req.method === "POST" || req.method === "PUT") && hasBody) {
    if (!req.is("application/json")) {
      sendError(res, "Content-Type must be application/json", 415);
      return;
    }
  }
  next();
};
