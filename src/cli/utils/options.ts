import { InvalidArgumentError } from "commander";

/**
 * "730,570, 440" → [730, 570, 440]
 */
export function parseAppIds(value: string): number[] {
  const ids = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map(Number);
  if (ids.length === 0 || ids.some((id) => !Number.isSafeInteger(id) || id <= 0)) {
    throw new InvalidArgumentError("Expected a comma-separated list of appids.");
  }
  return [...new Set(ids)];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseIsoDay(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(value))) {
    throw new InvalidArgumentError("Expected a YYYY-MM-DD date.");
  }
  return value;
}

export function parsePeriod(value: string): string {
  if (!/^\d{4}-(0[1-9]|1[0-2])$/.test(value)) {
    throw new InvalidArgumentError("Expected a YYYY-MM month.");
  }
  return value;
}
