import {describe, it, expect, vi} from "vitest";
import {intDiv, randBetween} from "../../src/index.js";

describe("util/maths", () => {
  describe("intDiv", () => {
    it("should divide whole number", () => {
      expect(intDiv(6, 3)).toBe(2);
    });
    it("should round less division", () => {
      expect(intDiv(9, 8)).toBe(1);
    });
  });

  describe("randBetween", () => {
    it("excludes the upper bound", () => {
      vi.spyOn(Math, "random").mockReturnValue(0.999999);
      expect(randBetween(0, 4)).toBe(3);
    });

    it("includes the lower bound", () => {
      vi.spyOn(Math, "random").mockReturnValue(0);
      expect(randBetween(2, 4)).toBe(2);
    });

    it("stays within range", () => {
      for (let i = 0; i < 100; i++) {
        const value = randBetween(0, 3);
        expect(value >= 0 && value < 3).toBe(true);
      }
    });
  });
});
