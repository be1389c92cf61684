import { HttpException, HttpStatus } from "@nestjs/common";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "AUTHENTICATION_ERROR"
  | "AUTHORIZATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL_ERROR";

export interface FieldViolation {
  field: string;
  message: string;
}

export interface ErrorEnvelope {
  status: "error";
  message: string;
  statusCode: number;
  code?: ErrorCode;
  details?: unknown;
}

export class AppError extends HttpException {
  constructor(
    readonly code: ErrorCode,
    message: string,
    statusCode: number,
    readonly details?: unknown,
  ) {
    super({ status: "error", message, statusCode, code, details } satisfies ErrorEnvelope, statusCode);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: FieldViolation[]) {
    super("VALIDATION_ERROR", message, HttpStatus.BAD_REQUEST, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = "Authentication required") {
    super("AUTHENTICATION_ERROR", message, HttpStatus.UNAUTHORIZED);
  }
}

export class AuthorizationError extends AppError {
  constructor(message = "Not allowed") {
    super("AUTHORIZATION_ERROR", message, HttpStatus.FORBIDDEN);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super("NOT_FOUND", message, HttpStatus.NOT_FOUND);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super("CONFLICT", message, HttpStatus.CONFLICT);
  }
}
