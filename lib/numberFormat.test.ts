import { describe, expect, it } from "vitest";
import { formatTrimmedDecimal } from "@/lib/numberFormat";

describe("formatTrimmedDecimal", () => {
  it("drops trailing zeros and the decimal point", () => {
    expect(formatTrimmedDecimal(175, 2)).toBe("175");
    expect(formatTrimmedDecimal(175.5, 2)).toBe("175.5");
    expect(formatTrimmedDecimal(175.25, 2)).toBe("175.25");
  });

  it("rounds beyond the allowed fraction digits", () => {
    expect(formatTrimmedDecimal(0.04, 3)).toBe("0.04");
    expect(formatTrimmedDecimal(2.3004, 3)).toBe("2.3");
  });
});
