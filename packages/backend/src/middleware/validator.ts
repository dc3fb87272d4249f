import type { RequestHandler } from "express";
import type { ZodIssue, ZodTypeAny } from "zod";

interface ValidationSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

type RequestPart = keyof ValidationSchemas;

function toDetails(part: RequestPart, issues: ZodIssue[]): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({
    path: [part, ...issue.path].join("."),
    message: issue.message
  }));
}

/**
 * Parses the selected request parts in place. Any failure answers 400 with
 * every issue found across body, query and params.
 */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    const details: Array<{ path: string; message: string }> = [];

    if (schemas.params) {
      const result = schemas.params.safeParse(req.params);
      if (result.success) {
        req.params = result.data;
      } else {
        details.push(...toDetails("params", result.error.issues));
      }
    }
    if (schemas.query) {
      const result = schemas.query.safeParse(req.query);
      if (result.success) {
        req.query = result.data;
      } else {
        details.push(...toDetails("query", result.error.issues));
      }
    }
    if (schemas.body) {
      const result = schemas.body.safeParse(req.body);
      if (result.success) {
        req.body = result.data;
      } else {
        details.push(...toDetails("body", result.error.issues));
      }
    }

    if (details.length > 0) {
      res.status(400).json({ error: "Validation failed", details });
      return;
    }
    next();
  };
};
