import { ConfigurationError } from "../utils/errors.js";
import { floatValue, intValue, type FieldValue } from "../data/field-value.js";

export type Ok<T> = { ok: true; value: T };
export type Err = { ok: false; error: Error };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = (error: Error): Err => ({ ok: false, error });

/** Combines the matched values of a left and right row. */
export type BinaryPredicate = (x: FieldValue, y: FieldValue) => Result<FieldValue>;

/** left - right; integers stay integers unless a float is involved. */
export function diff(x: FieldValue, y: FieldValue): Result<FieldValue> {
  if (x.kind === "int" && y.kind === "int") {
    if (typeof x.value === "number" && typeof y.value === "number") {
      return ok(intValue(x.value - y.value));
    }
    return ok(intValue(BigInt(x.value) - BigInt(y.value)));
  }
  if ((x.kind === "int" || x.kind === "float") && (y.kind === "int" || y.kind === "float")) {
    return ok(floatValue(Number(x.value) - Number(y.value)));
  }
  return err(new TypeError(`cannot calculate diff of ${x.kind} and ${y.kind}`));
}

const predicates = new Map<string, BinaryPredicate>([["diff", diff]]);

export function registerPredicate(name: string, predicate: BinaryPredicate): void {
  predicates.set(name, predicate);
}

export function hasPredicate(name: string): boolean {
  return predicates.has(name);
}

export function getPredicate(name: string): BinaryPredicate {
  const predicate = predicates.get(name);
  if (!predicate) {
    throw new ConfigurationError(`unknown predicate: "${name}"`);
  }
  return predicate;
}
