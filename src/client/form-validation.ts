/**
 * Client-side checks for the login and registration forms. They use the
 * server's own patterns and messages, so a form that passes here only fails
 * on the server for reasons the browser cannot know (taken email, wrong
 * password).
 */

import {
  CONFIRM_MESSAGE,
  EMAIL_MESSAGE,
  EMAIL_PATTERN,
  PASSWORD_MESSAGE,
  PASSWORD_PATTERN,
} from "../shared/validators/auth";

export type AuthFormMode = "login" | "register";

export interface AuthFields {
  email: string;
  password: string;
  confirmPassword?: string;
}

/** Field name → message for every invalid field; empty when the form is valid. */
export function validateAuthFields(mode: AuthFormMode, fields: AuthFields): Record<string, string> {
  const errors: Record<string, string> = {};

  if (!EMAIL_PATTERN.test(fields.email.trim())) {
    errors.email = EMAIL_MESSAGE;
  }

  if (mode === "login") {
    if (fields.password.length === 0) errors.password = "Password is required";
    return errors;
  }

  if (!PASSWORD_PATTERN.test(fields.password)) {
    errors.password = PASSWORD_MESSAGE;
  }
  if (fields.password !== (fields.confirmPassword ?? "")) {
    errors.confirmPassword = CONFIRM_MESSAGE;
  }
  return errors;
}

function fieldValue(form: HTMLFormElement, name: string): string {
  const field = form.elements.namedItem(name);
  return field instanceof HTMLInputElement ? field.value : "";
}

/** Validate on submit and show each message in its `.field-error[data-for]` slot. */
export function initFormValidation(form: HTMLFormElement): void {
  const mode: AuthFormMode = form.dataset.validate === "register" ? "register" : "login";

  form.addEventListener("submit", (event) => {
    const errors = validateAuthFields(mode, {
      email: fieldValue(form, "email"),
      password: fieldValue(form, "password"),
      confirmPassword: fieldValue(form, "confirmPassword"),
    });

    for (const slot of form.querySelectorAll<HTMLElement>(".field-error[data-for]")) {
      slot.textContent = errors[slot.dataset.for ?? ""] ?? "";
    }

    if (Object.keys(errors).length > 0) {
      event.preventDefault();
    }
  });
}
