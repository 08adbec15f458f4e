import { describe, it, expect } from "vitest";
import { formatCompactTime, formatLocalTime } from "../../src/utils/time.js";

describe("time formatting", () => {
  const at = new Date(2025, 2, 4, 7, 8, 9);

  it("formats local time for replies and display", () => {
    expect(formatLocalTime(at)).toBe("2025-03-04 07:08:09");
  });

  it("formats compact time for file names", () => {
    expect(formatCompactTime(at)).toBe("20250304_070809");
  });
});
