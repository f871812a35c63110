import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { HttpError } from "../utils/http-error";
import { logger } from "../utils/logger";

const hasStatus = (err: unknown): err is { status: number; message?: string } =>
  typeof err === "object" &&
  err !== null &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 600;

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: err.issues[0]?.message || "Invalid payload",
    });
  }

  // body-parser errors carry a status too
  if (err instanceof HttpError || hasStatus(err)) {
    return res.status(err.status).json({
      message: err.message || "Request failed",
    });
  }

  const message = err instanceof Error ? err.message : "Unknown error";
  logger.error({ err, path: req.path }, "Unhandled error");
  res.status(500).json({
    message: "Internal server error",
    error: process.env.NODE_ENV === "development" ? message : undefined,
  });
};
