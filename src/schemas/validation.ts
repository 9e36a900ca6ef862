/**
 * Validation helpers for decoding untrusted JSON with Zod.
 */

import { z } from "zod";

export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; message: string };

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function decode<T>(schema: z.ZodType<T>, data: unknown): DecodeResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, message: formatZodError(result.error) };
}
