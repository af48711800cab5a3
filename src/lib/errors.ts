import { NextResponse } from "next/server";
import { ZodError } from "zod";

export type ErrorCode =
  | "BAD_REQUEST"
  | "NOT_FOUND"
  | "NO_MATCHES"
  | "NOT_CONFIGURED"
  | "INTERNAL";

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  NO_MATCHES: 400,
  NOT_CONFIGURED: 503,
  INTERNAL: 500,
};

export interface ApiError {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Base class for failures the caller is meant to see and tell apart.
 */
export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The recipe does not exist or has no ingredients. */
export class RecipeNotFoundError extends AppError {
  constructor(readonly recipeId: number) {
    super("NOT_FOUND", "Recipe not found or has no ingredients", { recipeId });
  }
}

/** The recipe has ingredients but none of them matched a product. */
export class NoMatchesError extends AppError {
  constructor(
    readonly recipeId: number,
    readonly skipped: string[]
  ) {
    super("NO_MATCHES", "No products matched, nothing to add", {
      recipeId,
      skipped,
    });
  }
}

/** No retailer access token is available for this user. */
export class NotConfiguredError extends AppError {
  constructor() {
    super("NOT_CONFIGURED", "Retailer account is not connected");
  }
}

/**
 * Create a standardized error response
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  status?: number
): NextResponse<ApiError> {
  return NextResponse.json(
    {
      error: {
        code,
        message,
        ...(details && { details }),
      },
    },
    { status: status ?? STATUS_BY_CODE[code] }
  );
}

/**
 * Handle Zod validation errors
 */
export function handleZodError(error: ZodError): NextResponse<ApiError> {
  return errorResponse("BAD_REQUEST", "Validation error", {
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

/**
 * Handle unknown errors
 */
export function handleError(error: unknown): NextResponse<ApiError> {
  if (error instanceof AppError) {
    return errorResponse(error.code, error.message, error.details);
  }

  if (error instanceof ZodError) {
    return handleZodError(error);
  }

  console.error("[API Error]", error);

  const message =
    error instanceof Error ? error.message : "An unexpected error occurred";

  return errorResponse("INTERNAL", message);
}
