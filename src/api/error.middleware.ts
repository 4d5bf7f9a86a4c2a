import { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import { Logger } from "../config/logger";
import { MatchingError, ValidationError } from "../shared/errors";

export function buildErrorMiddleware(logger: Logger): ErrorRequestHandler {
  return (error: unknown, request: Request, response: Response, _next: NextFunction): void => {
    if (error instanceof ValidationError) {
      logger.warn("Rejected invalid input", {
        route: request.path,
        target: error.target,
        issues: error.issues,
      });
      response.status(400).json({ ok: false, error: error.message, issues: error.issues });
      return;
    }

    const bodyErrorType = bodyParserErrorType(error);
    if (bodyErrorType === "entity.parse.failed") {
      response.status(400).json({ ok: false, error: "Malformed JSON body" });
      return;
    }
    if (bodyErrorType === "entity.too.large") {
      response.status(413).json({ ok: false, error: "Request body too large" });
      return;
    }

    logger.error("Unexpected error while serving request", {
      route: request.path,
      error_code: error instanceof MatchingError ? error.code : undefined,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(500).json({ ok: false, error: "Internal server error" });
  };
}

export function notFoundHandler(_request: Request, response: Response): void {
  response.status(404).json({ ok: false, error: "Route not found" });
}

// body-parser tags its errors with a string `type`.
function bodyParserErrorType(error: unknown): string | undefined {
  if (error instanceof Error && "type" in error && typeof error.type === "string") {
    return error.type;
  }
  return undefined;
}
