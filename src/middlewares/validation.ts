/**
 * Validation Middleware
 * Parses request params and query strings against Zod schemas.
 */

import { ZodError, type ZodType, type ZodTypeDef } from "zod";
import { ValidationError } from "../utils/errors.js";

/**
 * Parses a request part, throwing ValidationError with per-field details.
 */
export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(
        error.issues.map((e) => ({
          path: e.path.join("."),
          message: e.message,
        }))
      );
    }
    throw error;
  }
}
