import { validate as isUuid } from "uuid";
import { ValidationError } from "./errors.js";

export const MAX_NAME_LENGTH = 50;
export const MAX_CONTENT_LENGTH = 280;

/** Length in code points, so an emoji counts once */
export function textLength(value: string): number {
  return [...value].length;
}

function requireText(raw: unknown, label: string, max: number): string {
  if (typeof raw !== "string") {
    throw new ValidationError(`${label} is required`);
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ValidationError(`${label} cannot be empty or whitespace only`);
  }

  const length = textLength(trimmed);
  if (length > max) {
    throw new ValidationError(`${label} too long: ${length} characters (max ${max})`);
  }

  return trimmed;
}

export function validateName(raw: unknown): string {
  return requireText(raw, "Name", MAX_NAME_LENGTH);
}

export function validateContent(raw: unknown): string {
  return requireText(raw, "Content", MAX_CONTENT_LENGTH);
}

export function validateMessageId(raw: unknown): string {
  if (typeof raw !== "string") {
    throw new ValidationError("Message ID is required");
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ValidationError("Message ID cannot be empty");
  }
  if (!isUuid(trimmed)) {
    throw new ValidationError("Message ID is malformed");
  }

  return trimmed;
}
