import { describe, it, expect } from "vitest";
import { extent, mean, stdDev, summarizeChannel } from "../cytometry/stats";
import type { Dataset } from "@shared/types/cytometry";

const dataset: Dataset = {
  FSC: [1, 2, 3, 4],
  SSC: [10, 10, 10, 10],
  FL1: [-5, 0, 5, 20],
  FL2: [2, 4, 4, 6],
  population: ["A", "A", "B", "B"],
};

describe("stats", () => {
  it("returns NaN for the mean of no values", () => {
    expect(mean([])).toBeNaN();
  });

  it("uses the sample standard deviation", () => {
    expect(stdDev([2, 4, 4, 6])).toBeCloseTo(Math.sqrt(8 / 3), 12);
    expect(stdDev([7])).toBe(0);
  });

  it("finds the smallest and largest value", () => {
    expect(extent([3, -1, 8, 0])).toEqual([-1, 8]);
  });

  describe("summarizeChannel", () => {
    it("summarizes one channel across every population", () => {
      const summary = summarizeChannel(dataset, "FSC");
      expect(summary.channel).toBe("FSC");
      expect(summary.mean).toBe(2.5);
      expect(summary.std).toBeCloseTo(Math.sqrt(5 / 3), 12);
      expect(summary.min).toBe(1);
      expect(summary.max).toBe(4);
    });

    it("reports zero spread for a constant channel", () => {
      expect(summarizeChannel(dataset, "SSC")).toEqual({ channel: "SSC", mean: 10, std: 0, min: 10, max: 10 });
    });
  });
});
