/**
 * Error taxonomy for the API and the Fastify handler that maps it onto HTTP.
 *
 * Services and repositories throw these; route handlers never build error
 * responses by hand.
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import type { ZodError, ZodTypeAny, output } from 'zod';

/** Per-field error messages, keyed by wire field name. */
export type FieldErrors = Record<string, string[]>;

/** Field key used for errors that are not tied to one input field. */
export const NON_FIELD_ERRORS = 'non_field_errors';

/** Invalid input. Maps to 400. */
export class ValidationError extends Error {
  constructor(
    readonly fields: FieldErrors,
    message = 'Validation failed',
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  /** Builds a ValidationError carrying a single message for one field. */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }

  /** Groups zod issues by their top-level field. */
  static fromZod(error: ZodError): ValidationError {
    const fields: FieldErrors = {};
    for (const issue of error.issues) {
      const key = issue.path.length > 0 ? String(issue.path[0]) : NON_FIELD_ERRORS;
      (fields[key] ??= []).push(issue.message);
    }
    return new ValidationError(fields);
  }
}

/**
 * Validates a request body. A missing body is treated as an empty object so
 * required-field errors name the fields.
 *
 * @throws {ValidationError} with per-field messages.
 */
export function parsePayload<S extends ZodTypeAny>(schema: S, payload: unknown): output<S> {
  const result = schema.safeParse(payload ?? {});
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}

/** Missing or invalid credentials. Maps to 401. */
export class AuthenticationError extends Error {
  constructor(message = 'Authentication credentials were not provided.') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Unknown id, or an id owned by someone else. Both cases share this error so
 * responses never reveal whether another user's record exists.
 */
export class NotFoundError extends Error {
  constructor(message = 'Not found.') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Registers the error and not-found handlers on an app.
 *
 * Fastify's own 4xx errors (malformed JSON, unsupported media type) keep their
 * status and message. Anything else is logged and answered with a bare 500.
 */
export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, req, reply) => {
    if (error instanceof ValidationError) {
      return reply.code(400).send({ error: error.message, fields: error.fields });
    }
    if (error instanceof AuthenticationError) {
      return reply.code(401).header('www-authenticate', 'Bearer').send({ error: error.message });
    }
    if (error instanceof NotFoundError) {
      return reply.code(404).send({ error: error.message });
    }

    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message });
    }

    req.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send({ error: 'Internal Server Error' });
  });

  app.setNotFoundHandler((_req, reply) => {
    return reply.code(404).send({ error: 'Not found.' });
  });
}
