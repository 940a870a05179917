/**
 * Zod Validation Middleware
 *
 * Validates JSON request bodies against a Zod schema and returns 400 with
 * structured error details on failure.
 */

import { createMiddleware } from 'hono/factory';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Format Zod validation errors into a consistent API response shape.
 */
export function formatZodErrors(error: ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export interface ValidateBodyOptions {
  /** Treat an empty body as `{}` so schema defaults apply */
  allowEmpty?: boolean;
}

type JsonRead = { ok: true; value: unknown } | { ok: false };

function parseJsonText(text: string, allowEmpty: boolean): JsonRead {
  if (text.trim() === '') {
    return allowEmpty ? { ok: true, value: {} } : { ok: false };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Middleware factory: validates the JSON body against `schema`.
 * On success the parsed data is available as `c.get('validatedBody')`.
 * On failure, returns 400 with `{ error, status, details }`.
 *
 * Usage:
 *   app.post('/foo', validateBody(mySchema), async (c) => {
 *     const body = c.get('validatedBody');
 *     ...
 *   });
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, options: ValidateBodyOptions = {}) {
  return createMiddleware<{ Variables: { validatedBody: T } }>(async (c, next) => {
    const read = parseJsonText(await c.req.text(), options.allowEmpty ?? false);
    if (!read.ok) {
      return c.json({ error: 'Invalid JSON body', status: 400 }, 400);
    }

    const result = schema.safeParse(read.value);
    if (!result.success) {
      return c.json(
        {
          error: 'Validation failed',
          status: 400,
          details: formatZodErrors(result.error),
        },
        400,
      );
    }

    c.set('validatedBody', result.data);
    return next();
  });
}
