/**
 * Credential validation shared by the server and the browser script.
 *
 * The browser checks the same patterns before submitting so most mistakes
 * are caught without a round-trip; the server re-validates every field.
 */

import { z } from "zod";

export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/** 8–72 characters (bcrypt ignores anything past 72 bytes), at least one letter and one digit. */
export const PASSWORD_PATTERN = /^(?=.*[A-Za-z])(?=.*\d).{8,72}$/;

export const EMAIL_MESSAGE = "Enter a valid email address";
export const PASSWORD_MESSAGE =
  "Password must be 8-72 characters and contain at least one letter and one number";
export const CONFIRM_MESSAGE = "Passwords do not match";

const emailField = z
  .string()
  .trim()
  .toLowerCase()
  .max(254, EMAIL_MESSAGE)
  .regex(EMAIL_PATTERN, EMAIL_MESSAGE);

export const loginSchema = z.object({
  email: emailField,
  password: z.string().min(1, "Password is required"),
});

export const registrationSchema = z
  .object({
    email: emailField,
    password: z.string().regex(PASSWORD_PATTERN, PASSWORD_MESSAGE),
    confirmPassword: z.string(),
  })
  .refine((values) => values.password === values.confirmPassword, {
    message: CONFIRM_MESSAGE,
    path: ["confirmPassword"],
  });
