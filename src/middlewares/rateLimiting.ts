/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 */

import rateLimit from "express-rate-limit";

/**
 * General API rate limiter.
 * Limits: 200 requests per 15 minutes per IP.
 * Use for: Signature lookups and reports.
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 200,
  message: { error: "Too many requests from this IP, please try again later." },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Strict rate limiter for operations that trigger work.
 * Limits: 20 requests per 15 minutes per IP.
 * Use for: Re-analysis requests.
 */
export const strictLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 20,
  message: { error: "Too many requests, please slow down." },
  standardHeaders: true,
  legacyHeaders: false,
});
