import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  ValidationIssue,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function validationResponse(issues: ValidationIssue[]): ErrorResponse {
  return {
    code: 'VALIDATION_ERROR',
    message: 'Validation failed',
    details: { issues },
  };
}

function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

// body-parser rejects with http-errors carrying a 4xx status and a type
const bodyParserErrorSchema = z.object({
  status: z.number().int().min(400).max(499),
  type: z.string(),
});

const bodyParserCodes: Record<string, string> = {
  'entity.too.large': 'PAYLOAD_TOO_LARGE',
  'charset.unsupported': 'UNSUPPORTED_MEDIA_TYPE',
  'encoding.unsupported': 'UNSUPPORTED_MEDIA_TYPE',
};

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    res.status(400).json(
      validationResponse(
        err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    return;
  }

  if (err instanceof ValidationError) {
    res.status(400).json(validationResponse(err.issues));
    return;
  }

  if (isJsonParseError(err)) {
    const response: ErrorResponse = {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  // Covers AuthError, whose message never says which check failed
  if (err instanceof UnauthorizedError) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: err.message,
    };
    res.status(401).json(response);
    return;
  }

  if (err instanceof NotFoundError) {
    const response: ErrorResponse = {
      code: 'NOT_FOUND',
      message: err.message,
    };
    res.status(404).json(response);
    return;
  }

  if (err instanceof ConflictError) {
    const response: ErrorResponse = {
      code: 'CONFLICT',
      message: err.message,
      ...(err.field ? { details: { field: err.field } } : {}),
    };
    res.status(409).json(response);
    return;
  }

  const bodyError = bodyParserErrorSchema.safeParse(err);
  if (bodyError.success) {
    const response: ErrorResponse = {
      code: bodyParserCodes[bodyError.data.type] ?? 'BAD_REQUEST',
      message: err.message,
    };
    res.status(bodyError.data.status).json(response);
    return;
  }

  // Unexpected: log the cause, keep it out of the response
  console.error('Error:', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
