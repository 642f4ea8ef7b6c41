import { Request, Response, NextFunction } from "express";
import { z, ZodError } from "zod";
import { BadRequestError } from "../utils/errors";

/**
 * Middleware to validate request data against a Zod schema
 * @param schema - Zod schema to validate against
 * @param source - Where to find the data to validate ('body', 'query', 'params')
 */
export function validate(schema: z.ZodTypeAny, source: "body" | "query" | "params" = "body") {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      // Replace the request data with the parsed value (defaults and transforms applied)
      req[source] = schema.parse(req[source]);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const errors = error.errors.map((err) => ({
          field: err.path.join("."),
          message: err.message,
        }));

        next(
          new BadRequestError(
            `Validation failed: ${errors.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message)).join(", ")}`,
            "validation_error",
            { errors }
          )
        );
      } else {
        next(error);
      }
    }
  };
}

/**
 * Middleware to validate URL parameters
 */
export function validateParams(schema: z.ZodTypeAny) {
  return validate(schema, "params");
}

/**
 * Middleware to validate request body
 */
export function validateBody(schema: z.ZodTypeAny) {
  return validate(schema, "body");
}
