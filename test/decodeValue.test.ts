import { describe, expect, it } from "vitest";
import { classifyMetricCell, decodeMetricValue, microsToUnits } from "../src/report/decodeValue";

describe("classifyMetricCell", () => {
  it("parses int64 strings", () => {
    expect(classifyMetricCell({ integerValue: "1234" })).toEqual({ type: "integer", value: 1234 });
    expect(classifyMetricCell({ microsValue: "2500000" })).toEqual({ type: "micros", value: 2500000 });
  });

  it("prefers integerValue over the other fields", () => {
    expect(classifyMetricCell({ integerValue: "3", doubleValue: 0.5 })).toEqual({
      type: "integer",
      value: 3,
    });
  });

  it("treats an empty cell as missing", () => {
    expect(classifyMetricCell({})).toEqual({ type: "missing" });
    expect(classifyMetricCell(undefined)).toEqual({ type: "missing" });
    expect(classifyMetricCell({ integerValue: null })).toEqual({ type: "missing" });
  });
});

describe("decodeMetricValue", () => {
  it("keeps micros unscaled with a _micros suffix", () => {
    expect(decodeMetricValue({ microsValue: "1234567" }, "micros")).toEqual({
      suffix: "_micros",
      value: 1234567,
    });
  });

  it("converts a micros cell to units for a float metric without changing the field name", () => {
    expect(decodeMetricValue({ microsValue: "1030000" }, "float")).toEqual({ suffix: "", value: 1.03 });
  });

  it("truncates a micros cell for an integer metric", () => {
    expect(decodeMetricValue({ microsValue: "7900000" }, "integer")).toEqual({ suffix: "", value: 7 });
  });

  it("returns integers without a suffix", () => {
    expect(decodeMetricValue({ integerValue: "42" }, "integer")).toEqual({ suffix: "", value: 42 });
  });

  it("accepts an integer cell for a float metric", () => {
    expect(decodeMetricValue({ integerValue: "1" }, "float")).toEqual({ suffix: "", value: 1 });
  });

  it("accepts a double cell for an integer metric by truncating", () => {
    expect(decodeMetricValue({ doubleValue: 7.9 }, "integer")).toEqual({ suffix: "", value: 7 });
  });

  it("returns doubles as floats", () => {
    expect(decodeMetricValue({ doubleValue: 0.0321 }, "float")).toEqual({ suffix: "", value: 0.0321 });
  });

  it("parses decimal strings", () => {
    expect(decodeMetricValue({ decimalValue: "12.75" }, "float")).toEqual({ suffix: "", value: 12.75 });
    expect(decodeMetricValue({ decimalValue: "12.75" }, "integer")).toEqual({ suffix: "", value: 12 });
    expect(decodeMetricValue({ value: "0.5" }, "float")).toEqual({ suffix: "", value: 0.5 });
  });

  it("defaults unparseable decimal strings to zero", () => {
    expect(decodeMetricValue({ decimalValue: "n/a" }, "float")).toEqual({ suffix: "", value: 0 });
    expect(decodeMetricValue({ decimalValue: "" }, "integer")).toEqual({ suffix: "", value: 0 });
  });

  it("defaults missing cells to zero and keeps the micros suffix for micros metrics", () => {
    expect(decodeMetricValue(undefined, "integer")).toEqual({ suffix: "", value: 0 });
    expect(decodeMetricValue({}, "float")).toEqual({ suffix: "", value: 0 });
    expect(decodeMetricValue(undefined, "micros")).toEqual({ suffix: "_micros", value: 0 });
  });
});

describe("microsToUnits", () => {
  it("divides by one million", () => {
    expect(microsToUnits(2_500_000)).toBe(2.5);
  });
});
