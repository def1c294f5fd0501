/**
 * Authentication Middleware
 * Validates bearer tokens and exposes the caller as res.locals.user
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import type { SupabaseClient } from "@supabase/supabase-js";
import { AppError } from "../utils/errors.js";

export interface AuthUser {
  id: string;
  email: string;
}

export type TokenVerifier = (token: string) => Promise<AuthUser | null>;

/**
 * Verifies a Supabase JWT with the auth API.
 */
export function supabaseTokenVerifier(client: SupabaseClient): TokenVerifier {
  return async (token) => {
    const {
      data: { user },
      error,
    } = await client.auth.getUser(token);

    if (error || !user) {
      return null;
    }
    return { id: user.id, email: user.email ?? "" };
  };
}

/**
 * Middleware to verify the bearer token and attach the user
 */
export function requireAuth(verify: TokenVerifier): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader || !authHeader.startsWith("Bearer ")) {
        throw new AppError("No authorization token provided", 401);
      }

      const token = authHeader.substring(7); // Remove 'Bearer ' prefix
      const user = await verify(token);

      if (!user) {
        throw new AppError("Invalid or expired token", 401);
      }

      res.locals.user = user;
      next();
    } catch (error) {
      if (error instanceof AppError) {
        res.status(error.statusCode).json({ error: error.message });
      } else {
        console.error("[auth] Token verification failed:", error);
        res.status(401).json({ error: "Authentication failed" });
      }
    }
  };
}
