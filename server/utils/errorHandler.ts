import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { USER_MESSAGES } from "../config/constants";
import { logError as writeErrorLog } from "./logger";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class UnsupportedMediaTypeError extends Error implements AppError {
  statusCode = 415;
  isOperational = true;
  constructor(contentType: string | undefined) {
    super(`Unsupported content type: ${contentType || "none"}`);
    this.name = "UnsupportedMediaTypeError";
  }
}

export class ConfigurationError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
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

/**
 * Raised when a payload crossing a component boundary does not have the
 * expected shape (as opposed to a failure while producing it).
 */
export class PayloadDecodeError extends Error implements AppError {
  isOperational = true;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PayloadDecodeError";
  }
}

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
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

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }

  // Internal detail never leaves the process
  if (statusCode >= 500) {
    res.status(statusCode).end();
    return;
  }
  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  writeErrorLog(`[${context}] ${message}`, { error: message, stack });
}

export type TurnErrorType = "decode" | "internal";

export interface ClassifiedError {
  type: TurnErrorType;
  userMessage: string;
  errorMessage: string;
  stack: string | undefined;
}

/**
 * Maps a failure inside a chat turn to the fixed reply shown to the user.
 */
export function classifyTurnError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);
  const stack = err instanceof Error ? err.stack : undefined;

  if (err instanceof PayloadDecodeError || err instanceof ZodError) {
    return {
      type: "decode",
      userMessage: USER_MESSAGES.DECODE_FAILURE,
      errorMessage,
      stack,
    };
  }

  return {
    type: "internal",
    userMessage: USER_MESSAGES.GENERIC_FAILURE,
    errorMessage,
    stack,
  };
}
