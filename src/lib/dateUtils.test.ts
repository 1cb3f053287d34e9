import { describe, it, expect } from "vitest";
import { parseLocalDate, formatDate, toDateInputValue } from "./dateUtils";

describe("dateUtils", () => {
  describe("parseLocalDate", () => {
    it("parses ISO date string as local date", () => {
      const result = parseLocalDate("2025-03-15");

      expect(result.getFullYear()).toBe(2025);
      expect(result.getMonth()).toBe(2); // March is month 2 (0-indexed)
      expect(result.getDate()).toBe(15);
    });

    it("handles January dates", () => {
      const result = parseLocalDate("2025-01-01");

      expect(result.getFullYear()).toBe(2025);
      expect(result.getMonth()).toBe(0);
      expect(result.getDate()).toBe(1);
    });
  });

  describe("toDateInputValue", () => {
    it("pads month and day", () => {
      expect(toDateInputValue(new Date(2026, 0, 5))).toBe("2026-01-05");
    });

    it("round-trips through parseLocalDate", () => {
      expect(toDateInputValue(parseLocalDate("2024-12-31"))).toBe("2024-12-31");
    });
  });

  describe("formatDate", () => {
    it("formats with the default pattern", () => {
      expect(formatDate("2025-03-15")).toBe("Mar 15, 2025");
    });

    it("formats with a custom pattern", () => {
      expect(formatDate("2025-03-15", "MMMM d")).toBe("March 15");
    });
  });
});
