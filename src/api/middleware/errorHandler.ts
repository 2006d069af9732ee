import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { createContextLogger } from "@/monitoring/logger";
import { ResilienceError } from "@/resilience/errors";
import "@/types/express";

interface ErrorResponse {
  error: string;
  correlationId: string;
  details?: unknown;
  stack?: string;
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const logger = createContextLogger(req.correlationId);

  let statusCode = 500;
  let message = "Internal Server Error";
  let isOperational = false;
  let details: unknown;

  if (error instanceof ResilienceError) {
    statusCode = error.statusCode;
    message = error.message;
    isOperational = error.isOperational;
  } else if (error instanceof ZodError) {
    statusCode = 400;
    message = "Invalid request data";
    isOperational = true;
    details = error.errors;
  }

  // Log error details
  logger.error("Request error", {
    error: error.message,
    stack: error.stack,
    statusCode,
    path: req.path,
    method: req.method,
    isOperational,
  });

  // Don't leak error details in production
  const response: ErrorResponse = {
    error: statusCode < 500 || isOperational ? message : "Internal Server Error",
    correlationId: req.correlationId,
  };

  if (details !== undefined) {
    response.details = details;
  }

  if (process.env.NODE_ENV === "development") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response) => {
  const logger = createContextLogger(req.correlationId);

  logger.warn("Route not found", {
    path: req.path,
    method: req.method,
  });

  res.status(404).json({
    error: "Not Found",
    message: `Route ${req.method} ${req.path} not found`,
    correlationId: req.correlationId,
  });
};
