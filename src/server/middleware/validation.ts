/**
 * Reusable Zod validation middleware for Express routes
 */

import { Request, Response, NextFunction } from "express";
import { ZodSchema, ZodError, ZodObject } from "zod";

export function formatZodIssues(error: ZodError) {
  return error.errors.map((err) => ({
    path: err.path.join("."),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Create Express middleware that validates request body using Zod schema.
 * Extra fields are rejected; the parsed body lands in res.locals.validatedBody.
 */
export function validateBody<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const strictSchema = schema instanceof ZodObject ? schema.strict() : schema;
      const result = strictSchema.safeParse(req.body);

      if (!result.success) {
        return res.status(400).json({
          ok: false,
          error: {
            code: "validation_error",
            message: "Request validation failed",
            details: formatZodIssues(result.error),
          },
        });
      }

      res.locals.validatedBody = result.data;
      next();
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      return res.status(500).json({
        ok: false,
        error: {
          code: "validation_error",
          message: `Validation middleware error: ${err.message}`,
        },
      });
    }
  };
}
