/**
 * Validation Middleware
 *
 * Zod-based request validation for body and params. Failures become a
 * ValidationError and flow to the error middleware.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodSchema } from "zod";
import { fromZodError } from "zod-validation-error";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema<Record<string, string>>;
}

/**
 * @example
 * app.post("/api/whatsapp/webhook", validate({ body: wahaWebhookSchema }), handler);
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(new ValidationError(fromZodError(error).message));
      } else {
        next(error);
      }
    }
  };
}

export const commonSchemas = {
  uuidId: z.object({
    id: z.string().uuid("Invalid UUID format"),
  }),
  assignmentList: z.object({
    limit: z.coerce.number().int().min(1).max(100).default(100),
    sender: z.string().min(1).optional(),
  }),
};
