import { describe, expect, it } from "vitest";
import { chunkArray, parseList } from "../src/lib/utils";

describe("utils", () => {
  it("chunkArray splits deterministically", () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(() => chunkArray([1], 0)).toThrow("chunk size must be > 0");
  });

  it("parseList accepts commas and newlines", () => {
    expect(parseList(" a, b\nc\n\n,")).toEqual(["a", "b", "c"]);
    expect(parseList(undefined)).toEqual([]);
  });
});
