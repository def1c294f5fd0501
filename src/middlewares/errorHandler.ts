/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { AppError, ValidationError } from "../utils/errors.js";

interface ErrorResponse {
  error: string;
  details?: { path: string; message: string }[];
  stack?: string;
}

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function createErrorHandler(nodeEnv: string): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const err = error instanceof Error ? error : new Error(String(error));
    const statusCode = err instanceof AppError ? err.statusCode : 500;
    const message = err.message || "Internal server error";

    console.error(`[Error] ${statusCode} - ${message}`, {
      error: err.name,
      path: req.path,
      method: req.method,
    });

    const response: ErrorResponse = { error: message };

    if (err instanceof ValidationError) {
      response.details = err.details;
    }

    // Include stack trace in development
    if (nodeEnv !== "production" && statusCode >= 500) {
      response.stack = err.stack;
    }

    res.status(statusCode).json(response);
  };
}
