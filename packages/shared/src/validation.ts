import type { ZodError } from "zod";

export const formatValidationError = (error: ZodError): string => {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "payload";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
};

export const trimToOptionalString = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};
