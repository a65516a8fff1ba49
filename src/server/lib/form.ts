import type { Context } from "hono";
import type { ZodError } from "zod";

/** The urlencoded form body as plain strings; file fields are dropped. */
export async function readForm(c: Context): Promise<Record<string, string>> {
  const body = await c.req.parseBody();
  const form: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === "string") form[key] = value;
  }
  return form;
}

/** The message of the first validation issue, for a single-line form error. */
export function firstIssue(error: ZodError): string {
  return error.issues[0]?.message ?? "Invalid input";
}
