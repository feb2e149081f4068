import { Value } from "@sinclair/typebox/value";

import type { TSchema } from "@sinclair/typebox";

/**
 * First validation error of a payload as "path: message".
 */
export function describeSchemaError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  return first !== undefined
    ? `${first.path === "" ? "/" : first.path}: ${first.message}`
    : "invalid payload";
}
