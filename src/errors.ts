import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  isOperational?: boolean;
}

/** Raised when a vector store is built from zero chunks. */
export class EmptyInputError extends Error implements AppError {
  statusCode = 422;
  isOperational = true;
  constructor(message = "Cannot create vector store from empty chunks") {
    super(message);
    this.name = "EmptyInputError";
  }
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

/**
 * Render an error as `{ success: false, error }`. Server-side failures are
 * logged with the route context; their message is not leaked to the client.
 */
export function handleRouteError(res: Response, error: unknown, context: string): void {
  const statusCode = getErrorStatusCode(error);
  if (statusCode >= 500) {
    console.error(`[${context}] Error:`, error);
  }
  const message =
    statusCode >= 500 && !hasStatusCode(error) ? "Internal server error" : getErrorMessage(error);
  res.status(statusCode).json({ success: false, error: message });
}
