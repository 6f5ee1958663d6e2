/**
 * Zod validation for Express routes
 */

import { NextFunction, Request, RequestHandler, Response } from "express";
import { z, ZodError } from "zod";

export interface ValidationErrorDetail {
  path: string;
  message: string;
  code: string;
}

export type ValidatedHandler<T> = (body: T, req: Request, res: Response) => void | Promise<void>;

export function formatZodIssues(error: ZodError): ValidationErrorDetail[] {
  return error.errors.map((err) => ({
    path: err.path.join("."),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Validate the request body, then hand the parsed value to `handler`.
 * A failed parse answers 400 in the standard error format; a handler error goes to `next`.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, handler: ValidatedHandler<T>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      res.status(400).json({
        ok: false,
        error: {
          code: "validation_error",
          message: "Request validation failed",
          details: formatZodIssues(result.error),
        },
      });
      return;
    }

    Promise.resolve()
      .then(() => handler(result.data, req, res))
      .catch(next);
  };
}
