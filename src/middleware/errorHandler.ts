import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { UnknownModelError } from "../devices/errors";

export function createErrorHandler(logger: Logger) {
  return function errorHandler(
    error: Error,
    request: Request,
    response: Response,
    _next: NextFunction,
  ): void {
    void _next;
    if (error instanceof UnknownModelError) {
      response.status(404).json({ detail: error.message });
      return;
    }
    logger.error({ error, url: request.originalUrl }, "Unhandled error");
    response.status(500).json({ detail: "Internal server error" });
  };
}
