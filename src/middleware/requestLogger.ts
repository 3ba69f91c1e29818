import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";

export function createRequestLogger(logger: Logger) {
  return function requestLogger(request: Request, response: Response, next: NextFunction) {
    const requestStart = Date.now();
    response.on("finish", () => {
      const entry = {
        method: request.method,
        url: request.originalUrl,
        status: response.statusCode,
        durationMs: Date.now() - requestStart,
      };
      // readings are fetched on every dashboard refresh; keep successful calls out of info
      if (response.statusCode >= 500) {
        logger.error(entry, "HTTP request failed");
      } else if (response.statusCode >= 400) {
        logger.warn(entry, "HTTP request rejected");
      } else {
        logger.debug(entry, "HTTP request completed");
      }
    });
    next();
  };
}
