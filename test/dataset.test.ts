import { describe, expect, it } from "vitest";

import { StaticDataSet } from "../src/data/dataset.js";
import {
  canonicalText,
  durationValue,
  floatValue,
  fromJsValue,
  intValue,
  nullValue,
  textValue,
  timestampValue,
  toPlotValue,
} from "../src/data/field-value.js";
import { scan } from "./helpers.js";

describe("field values", () => {
  it("formats join keys the same regardless of numeric kind", () => {
    expect(canonicalText(intValue(3))).toBe("3");
    expect(canonicalText(floatValue(3))).toBe("3");
    expect(canonicalText(floatValue(2.5))).toBe("2.5");
  });

  it("formats timestamps as RFC 3339 without fractional seconds", () => {
    const value = timestampValue(new Date("2023-05-08T10:00:00.123Z"));
    expect(canonicalText(value)).toBe("2023-05-08T10:00:00Z");
    expect(toPlotValue(value)).toBe("2023-05-08T10:00:00Z");
  });

  it("maps durations and nulls onto plot values", () => {
    expect(canonicalText(durationValue(90))).toBe("90s");
    expect(toPlotValue(durationValue(90))).toBe(90);
    expect(canonicalText(nullValue())).toBe("null");
    expect(toPlotValue(nullValue())).toBeNull();
  });

  it("keeps every digit of integers outside the safe range", () => {
    const big = intValue(9007199254740993n);
    expect(big).toEqual({ kind: "int", value: 9007199254740993n });
    expect(canonicalText(big)).toBe("9007199254740993");
    expect(canonicalText(intValue(9007199254740992n))).toBe("9007199254740992");
    expect(toPlotValue(big)).toBe("9007199254740993");
    expect(intValue(42n)).toEqual(intValue(42));
  });

  it("converts plain values", () => {
    expect(fromJsValue(4)).toEqual(intValue(4));
    expect(fromJsValue(4.5)).toEqual(floatValue(4.5));
    expect(fromJsValue("x")).toEqual(textValue("x"));
    expect(fromJsValue(undefined)).toEqual(nullValue());
    expect(fromJsValue(true)).toEqual({ kind: "bool", value: true });
  });
});

describe("StaticDataSet", () => {
  const rows = [
    { region: "north", count: 1 },
    { region: "south", count: 2.5 },
  ];

  it("rescans identically after a reset", () => {
    const ds = StaticDataSet.fromRows(rows);
    const first = scan(ds, ["region", "count"]);
    ds.resetIterator();
    const second = scan(ds, ["region", "count"]);

    expect(first).toEqual([
      ["north", "1"],
      ["south", "2.5"],
    ]);
    expect(second).toEqual(first);
  });

  it("fills missing columns with nulls", () => {
    const ds = StaticDataSet.fromRows([{ a: 1 }, { b: "x" }]);
    expect(ds.fieldNames).toEqual(["a", "b"]);
    expect(scan(ds, ["a", "b"])).toEqual([
      ["1", "null"],
      ["null", "x"],
    ]);
  });

  it("returns an error value for unknown fields", () => {
    const ds = StaticDataSet.fromRows(rows);
    ds.next();
    const value = ds.field("missing");
    expect(value.kind).toBe("error");
    expect(canonicalText(value)).toBe('unknown field "missing"');
  });

  it("returns an error value before the first row", () => {
    const ds = StaticDataSet.fromRows(rows);
    expect(ds.field("region").kind).toBe("error");
  });

  it("reports the end error only once iteration finishes", () => {
    const failure = new Error("connection reset");
    const ds = StaticDataSet.fromRows(rows, { endError: failure });

    expect(ds.next()).toBe(true);
    expect(ds.err()).toBeNull();
    expect(ds.next()).toBe(true);
    expect(ds.next()).toBe(false);
    expect(ds.err()).toBe(failure);

    ds.resetIterator();
    expect(ds.err()).toBeNull();
  });
});
