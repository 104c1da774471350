import type { ErrorRequestHandler, Response } from "express";
import type { ZodError } from "zod";
import { CateringError, CateringErrorCode } from "@catering/engine";

/**
 * Standardized API error codes.
 * Every error response from the API should include one of these codes.
 */
export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  UNKNOWN_CATALOG_ITEM: "UNKNOWN_CATALOG_ITEM",
  BAD_REQUEST: "BAD_REQUEST",
  NOT_FOUND: "NOT_FOUND",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorBody = { error: string; code: ErrorCodeType; details?: object };

/**
 * Standard error response shape:
 *   { error: string, code: string, details?: object }
 */
export function sendError(
  res: Response,
  status: number,
  error: string,
  code: ErrorCodeType = ErrorCode.BAD_REQUEST,
  details?: object,
): void {
  const body: ErrorBody = { error, code };
  if (details) body.details = details;
  res.status(status).json(body);
}

export function send404(res: Response, entity: string): void {
  sendError(res, 404, `${entity} not found`, ErrorCode.NOT_FOUND);
}

export function sendValidationError(res: Response, error: ZodError): void {
  sendError(res, 400, "request body failed validation", ErrorCode.VALIDATION_FAILED, {
    issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
  });
}

/** Status and body for an error thrown while computing a response. */
export function describeError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof CateringError) {
    const code =
      error.code === CateringErrorCode.CONFIGURATION_ERROR ? ErrorCode.UNKNOWN_CATALOG_ITEM : ErrorCode.BAD_REQUEST;
    const body: ErrorBody = { error: error.message, code };
    if (error.details) body.details = error.details;
    return { status: 400, body };
  }
  return { status: 500, body: { error: "internal error", code: ErrorCode.INTERNAL_ERROR } };
}

export function sendComputationError(res: Response, error: unknown): void {
  const { status, body } = describeError(error);
  if (status >= 500) console.error("prep report failed", error);
  res.status(status).json(body);
}

type BodyParserError = Error & { type: string; status: number };

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

/** Like describeError, but also maps the body parser's own 4xx failures. */
export function describeRequestError(error: unknown): { status: number; body: ErrorBody } {
  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    if (error.type === "entity.parse.failed") {
      return { status: 400, body: { error: "request body is not valid JSON", code: ErrorCode.VALIDATION_FAILED } };
    }
    return { status: error.status, body: { error: error.message, code: ErrorCode.BAD_REQUEST } };
  }
  return describeError(error);
}

/** Last middleware in the chain: every error leaves in the standard shape. */
export const handleRequestError: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const { status, body } = describeRequestError(error);
  if (status >= 500) console.error("request failed", error);
  res.status(status).json(body);
};
