// src/assets/mime.ts
import { lookup } from "mime-types";

export const DEFAULT_MIME = "application/octet-stream";

/** MIME type from the file extension; octet-stream when unknown. */
export function mimeForPath(p: string): string {
  return lookup(p) || DEFAULT_MIME;
}
