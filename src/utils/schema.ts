import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";

/** Returns the value typed by the schema, or throws naming the first failing path. */
export function assertSchema<T extends TSchema>(schema: T, value: unknown, what: string): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const first = Value.Errors(schema, value).First();
  const where = first?.path ? ` at ${first.path}` : "";
  throw new ConfigurationError(`invalid ${what}${where}: ${first?.message ?? "unexpected value"}`);
}
