import { Request, Response, NextFunction } from "express";
import { config } from "../config/env";
import { DiagnosisError, ValidationError } from "../utils/errors";
import logger from "../utils/logger";

interface BodyParserError extends Error {
  type: string;
  status: number;
}

const isBodyParserError = (error: Error): error is BodyParserError =>
  "type" in error && typeof error.type === "string" && "status" in error && typeof error.status === "number";

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express identifies error middleware by arity
  _next: NextFunction
): void => {
  // Don't leak error details in production
  const isDevelopment = config.nodeEnv === "development";

  if (error instanceof ValidationError) {
    res.status(400).json({
      success: false,
      message: "Invalid patient data",
      errors: error.violations,
    });
    return;
  }

  if (isBodyParserError(error) && error.status < 500) {
    res.status(error.status).json({
      success: false,
      message: error.type === "entity.parse.failed" ? "Malformed JSON body" : error.message,
    });
    return;
  }

  logger.error({ err: error, path: req.originalUrl }, "Unhandled request error");

  const status = error instanceof DiagnosisError ? error.status : 500;
  res.status(status).json({
    success: false,
    message: isDevelopment ? error.message : "Internal server error",
    ...(isDevelopment && { stack: error.stack }),
  });
};

export const notFound = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    message: `Route ${req.originalUrl} not found`,
  });
};
