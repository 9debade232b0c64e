// src/http/headers.ts
import type { Request } from "express";
import { AppError } from "../errors/AppError";

// Visible ASCII plus space and horizontal tab.
const VISIBLE_ASCII = /^[\t\x20-\x7e]*$/;

/**
 * Read one request header as a string.
 * Throws a headerParse AppError (400) when the header is missing, repeated,
 * or carries bytes outside visible ASCII.
 */
export function headerValue(req: Request, name: string): string {
  const raw = req.headers[name.toLowerCase()];
  if (raw === undefined) {
    throw AppError.headerParse(new Error(`missing header "${name}"`));
  }
  if (Array.isArray(raw)) {
    throw AppError.headerParse(new Error(`header "${name}" is repeated`));
  }
  if (!VISIBLE_ASCII.test(raw)) {
    throw AppError.headerParse(
      new Error(`header "${name}" contains non-visible-ASCII characters`)
    );
  }
  return raw;
}
