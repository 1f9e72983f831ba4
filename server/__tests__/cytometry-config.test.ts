import { describe, it, expect } from "vitest";
import { CYTOMETRY_DEFAULTS, DEFAULT_POPULATIONS, loadSimulatorConfig } from "../cytometry/config";
import { ConfigError } from "../cytometry/errors";

describe("loadSimulatorConfig", () => {
  it("falls back to the defaults with an empty environment", () => {
    const config = loadSimulatorConfig({});
    expect(config).toEqual({
      seed: undefined,
      totalCells: 10000,
      spillover: { fl2IntoFl1: 0.1, fl1IntoFl2: 0.05 },
      doublePositiveShift: { shiftMean: 20, shiftStd: 5 },
      allocation: "independent",
      populations: DEFAULT_POPULATIONS,
    });
  });

  it("reads values from the environment", () => {
    const config = loadSimulatorConfig({
      FLOW_SIM_SEED: "42",
      FLOW_SIM_TOTAL_CELLS: "2500",
      FLOW_SIM_SPILLOVER_FL2_INTO_FL1: "0.2",
      FLOW_SIM_SPILLOVER_FL1_INTO_FL2: "0.15",
      FLOW_SIM_ALLOCATION: "largest_remainder",
    });
    expect(config.seed).toBe(42);
    expect(config.totalCells).toBe(2500);
    expect(config.spillover).toEqual({ fl2IntoFl1: 0.2, fl1IntoFl2: 0.15 });
    expect(config.allocation).toBe("largest_remainder");
  });

  it("ignores blank variables", () => {
    const config = loadSimulatorConfig({ FLOW_SIM_SEED: "", FLOW_SIM_TOTAL_CELLS: "  " });
    expect(config.seed).toBeUndefined();
    expect(config.totalCells).toBe(CYTOMETRY_DEFAULTS.totalCells);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadSimulatorConfig({ FLOW_SIM_TOTAL_CELLS: "2500" }, { totalCells: 300, seed: 0 });
    expect(config.totalCells).toBe(300);
    expect(config.seed).toBe(0);
  });

  it.each([
    { FLOW_SIM_TOTAL_CELLS: "lots" },
    { FLOW_SIM_TOTAL_CELLS: "-10" },
    { FLOW_SIM_TOTAL_CELLS: "12.5" },
    { FLOW_SIM_SEED: "-1" },
    { FLOW_SIM_SEED: "4294967296" },
    { FLOW_SIM_ALLOCATION: "proportional" },
    { FLOW_SIM_SPILLOVER_FL2_INTO_FL1: "1.5" },
    { FLOW_SIM_SPILLOVER_FL1_INTO_FL2: "-0.1" },
  ])("rejects %o", (env) => {
    expect(() => loadSimulatorConfig(env)).toThrow(ConfigError);
  });

  it("accepts the largest 32-bit seed", () => {
    expect(loadSimulatorConfig({ FLOW_SIM_SEED: "4294967295" }).seed).toBe(4294967295);
  });

  it.each([
    { shiftMean: 0, shiftStd: 5 },
    { shiftMean: 20, shiftStd: -5 },
  ])("rejects the double-positive shift %o", (doublePositiveShift) => {
    expect(() => loadSimulatorConfig({}, { doublePositiveShift })).toThrow(ConfigError);
  });

  it("keeps a zero-spread shift", () => {
    const config = loadSimulatorConfig({}, { doublePositiveShift: { shiftMean: 1, shiftStd: 0 } });
    expect(config.doublePositiveShift).toEqual({ shiftMean: 1, shiftStd: 0 });
  });
});
