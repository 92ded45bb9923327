import { describe, expect, it } from "vitest";
import { addDaysUtc, compactToIsoDate, isIsoDate, toCompactDate, toDateParts, yesterdayUtc } from "../src/lib/dates";

describe("dates", () => {
  it("converts compact dates and passes other shapes through", () => {
    expect(compactToIsoDate("20250515")).toBe("2025-05-15");
    expect(compactToIsoDate("2025-05-15")).toBe("2025-05-15");
    expect(compactToIsoDate("2025051")).toBe("2025051");
    expect(compactToIsoDate("")).toBe("");
  });

  it("adds days across month and year boundaries", () => {
    expect(addDaysUtc("2026-01-01", -1)).toBe("2025-12-31");
    expect(addDaysUtc("2024-02-28", 1)).toBe("2024-02-29");
  });

  it("computes yesterday in UTC", () => {
    expect(yesterdayUtc(new Date("2026-10-18T00:30:00Z"))).toBe("2026-10-17");
  });

  it("splits and validates ISO dates", () => {
    expect(toDateParts("2026-10-17")).toEqual({ year: 2026, month: 10, day: 17 });
    expect(() => toDateParts("17/10/2026")).toThrow("Invalid date (expected YYYY-MM-DD): 17/10/2026");
    expect(isIsoDate("2026-02-29")).toBe(false);
    expect(isIsoDate("2028-02-29")).toBe(true);
    expect(toCompactDate("2026-10-17")).toBe("20261017");
  });
});
