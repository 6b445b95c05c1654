import { describe, it, expect } from "vitest";
import { classifySeason, compareSeasons } from "@/lib/mars/season";
import type { SeasonLabel } from "@/lib/domain/types";

describe("classifySeason", () => {
  it("partitions [0, 360) with inclusive lower bounds", () => {
    const cases: [number, SeasonLabel][] = [
      [0, "Spring"],
      [89.999, "Spring"],
      [90, "Summer"],
      [179.999, "Summer"],
      [180, "Autumn"],
      [269.999, "Autumn"],
      [270, "Winter"],
      [359.999, "Winter"],
    ];
    for (const [ls, season] of cases) {
      expect(classifySeason(ls)).toBe(season);
    }
  });

  it("does not wrap out-of-range values", () => {
    expect(classifySeason(-5)).toBe("Unknown");
    expect(classifySeason(360)).toBe("Unknown");
    expect(classifySeason(1000)).toBe("Unknown");
  });

  it("labels non-finite values Unknown", () => {
    expect(classifySeason(Number.NaN)).toBe("Unknown");
    expect(classifySeason(Number.POSITIVE_INFINITY)).toBe("Unknown");
    expect(classifySeason(Number.NEGATIVE_INFINITY)).toBe("Unknown");
  });
});

describe("compareSeasons", () => {
  it("sorts into display order", () => {
    const labels: SeasonLabel[] = ["Unknown", "Winter", "Spring", "Autumn", "Summer"];
    expect([...labels].sort(compareSeasons)).toEqual(["Spring", "Summer", "Autumn", "Winter", "Unknown"]);
  });
});
