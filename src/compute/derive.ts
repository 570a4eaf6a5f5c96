import { DataAccessError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { StaticDataSet, type DataSet } from "../data/dataset.js";
import { canonicalText, type FieldValue } from "../data/field-value.js";
import { getPredicate } from "./predicates.js";

export interface DeriveInput {
  /** Dataset name, used in error messages. */
  name: string;
  dataSet: DataSet;
  joinField: string;
  valueField: string;
}

function readField(input: DeriveInput, field: string): FieldValue {
  const value = input.dataSet.field(field);
  if (value.kind === "error") {
    throw new DataAccessError(`did not get field "${field}" from dataset "${input.name}": ${value.error.message}`, {
      cause: value.error,
    });
  }
  return value;
}

function checkIteration(input: DeriveInput): void {
  const error = input.dataSet.err();
  if (error) {
    throw new DataAccessError(`dataset "${input.name}" iteration ended with an error: ${error.message}`, {
      cause: error,
    });
  }
}

/**
 * Joins two datasets on their join fields and applies a named predicate to
 * the value fields of matching rows. The right side is read into memory
 * once; the left side is streamed once and drives the output order. Left
 * rows without a right match are dropped. When the right side repeats a key
 * the last row read wins.
 */
export function derive(predicateName: string, left: DeriveInput, right: DeriveInput): DataSet {
  const predicate = getPredicate(predicateName);

  left.dataSet.resetIterator();
  right.dataSet.resetIterator();

  const rightValues = new Map<string, FieldValue>();
  while (right.dataSet.next()) {
    const join = readField(right, right.joinField);
    rightValues.set(canonicalText(join), readField(right, right.valueField));
  }
  checkIteration(right);

  const keys: FieldValue[] = [];
  const values: FieldValue[] = [];

  while (left.dataSet.next()) {
    const join = readField(left, left.joinField);
    const matched = rightValues.get(canonicalText(join));
    if (!matched) {
      logger.debug("no matching row for join field", { dataset: left.name, join: canonicalText(join) });
      continue;
    }

    const result = predicate(readField(left, left.valueField), matched);
    if (!result.ok) {
      throw new DataAccessError(`predicate "${predicateName}": ${result.error.message}`, { cause: result.error });
    }

    keys.push(join);
    values.push(result.value);
  }
  checkIteration(left);

  return new StaticDataSet({ key: keys, value: values });
}
