import { Request, Response, NextFunction } from "express";
import rateLimit, { RateLimitRequestHandler } from "express-rate-limit";
import helmet from "helmet";
import { CorsOptions } from "cors";

// Per-IP limit on the diagnosis route; each request may call the reviewer twice
export const createDiagnosisLimiter = (maxPerMinute: number): RateLimitRequestHandler =>
  rateLimit({
    windowMs: 60 * 1000,
    max: maxPerMinute,
    message: {
      success: false,
      message: "Too many diagnosis requests, please try again later",
    },
    standardHeaders: true,
    legacyHeaders: false,
    validate: {
      trustProxy: false,
    },
  });

export const createCorsOptions = (allowedOrigins: string[]): CorsOptions => ({
  origin: allowedOrigins,
  optionsSuccessStatus: 200,
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With"],
  exposedHeaders: ["X-Diagnosis-Emergency"],
});

// Helmet configuration for security headers
export const helmetConfig = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      scriptSrc: ["'self'"],
    },
  },
  crossOriginEmbedderPolicy: false,
});

export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.method === "POST") {
    const contentType = req.headers["content-type"];
    if (!contentType || !contentType.includes("application/json")) {
      res.status(415).json({
        success: false,
        message: "Content-Type must be application/json",
      });
      return;
    }
  }
  next();
};
