/**
 * Custom Error Classes
 * ====================
 * Typed faults returned by services (as `Result` errors) and thrown at the
 * GraphQL boundary. `kind` is the tag the error filter matches on.
 */

export type FaultKind =
  | "ValidationFailure"
  | "DuplicateEmail"
  | "InvalidCredentials"
  | "NotFound"
  | "Unauthenticated"
  | "Forbidden"
  | "Unexpected";

export type FieldErrors = Record<string, string[]>;

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly kind: FaultKind = "Unexpected",
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error, one or more messages per input field
 */
export class ValidationError extends AppError {
  constructor(public readonly fields: FieldErrors) {
    super("Validation failed.", "ValidationFailure", 400, "VALIDATION_ERROR");
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }
}

export class DuplicateEmailError extends AppError {
  constructor(public readonly email: string) {
    super(`Email '${email}' is already in use`, "DuplicateEmail", 409, "DUPLICATE_EMAIL");
  }
}

/**
 * Login failure. Same message whether the email or the password was wrong.
 */
export class InvalidCredentialsError extends AppError {
  constructor() {
    super("Invalid email or password", "InvalidCredentials", 401, "INVALID_CREDENTIALS");
  }
}

/**
 * Resource not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier
        ? `${resource} with ID '${identifier}' not found`
        : `${resource} not found`,
      "NotFound",
      404,
      "NOT_FOUND"
    );
  }
}

/**
 * Authentication error
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, "Unauthenticated", 401, "AUTHENTICATION_ERROR");
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = "Not authorized") {
    super(message, "Forbidden", 403, "AUTHORIZATION_ERROR");
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, "Unexpected", 500, "CONFIGURATION_ERROR");
  }
}
