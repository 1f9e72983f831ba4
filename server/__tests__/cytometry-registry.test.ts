import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { PopulationRegistry } from "../cytometry/registry";
import {
  DuplicatePopulationError,
  NotFoundError,
  ValidationError,
} from "../cytometry/errors";

describe("PopulationRegistry", () => {
  let registry: PopulationRegistry;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    registry = new PopulationRegistry();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("defaults", () => {
    it("lists the three built-in populations in registration order", () => {
      expect(registry.list().map((p) => p.name)).toEqual(["lymphocytes", "monocytes", "granulocytes"]);
      expect(registry.size).toBe(3);
    });

    it("carries the default parameters", () => {
      expect(registry.get("lymphocytes")).toEqual({
        name: "lymphocytes",
        proportion: 0.6,
        fscMean: 8,
        fscStd: 1.5,
        sscMean: 15,
        sscStd: 2,
        fl1Mean: 30,
        fl1Std: 5,
        fl2Mean: 10,
        fl2Std: 2,
        doublePositiveFraction: 0.1,
      });
      expect(registry.proportionTotal()).toBeCloseTo(1, 10);
    });
  });

  describe("get", () => {
    it("fails with NotFoundError for an unknown name", () => {
      expect(() => registry.get("eosinophils")).toThrow(NotFoundError);
    });

    it("returns a copy that cannot change the registry", () => {
      const spec = registry.get("monocytes");
      spec.fscMean = 999;
      expect(registry.get("monocytes").fscMean).toBe(15);
    });
  });

  describe("update", () => {
    it("rejects a negative standard deviation and keeps the prior value", () => {
      expect(() => registry.update("lymphocytes", "fscStd", -1)).toThrow(ValidationError);
      expect(registry.get("lymphocytes").fscStd).toBe(1.5);
    });

    it("rejects a zero standard deviation", () => {
      expect(() => registry.update("granulocytes", "fl2Std", 0)).toThrow(ValidationError);
      expect(registry.get("granulocytes").fl2Std).toBe(7);
    });

    it("applies a valid proportion", () => {
      const updated = registry.update("lymphocytes", "proportion", 0.5);
      expect(updated.proportion).toBe(0.5);
      expect(registry.get("lymphocytes").proportion).toBe(0.5);
    });

    it("accepts a proportion of exactly 1", () => {
      expect(registry.update("monocytes", "proportion", 1).proportion).toBe(1);
    });

    it.each([0, -0.2, 1.01, Number.NaN, Number.POSITIVE_INFINITY])(
      "rejects proportion %s",
      (value) => {
        expect(() => registry.update("monocytes", "proportion", value)).toThrow(ValidationError);
        expect(registry.get("monocytes").proportion).toBe(0.3);
      },
    );

    it("rejects non-numeric values", () => {
      expect(() => registry.update("monocytes", "fl1Mean", "sixty")).toThrow(ValidationError);
      expect(registry.get("monocytes").fl1Mean).toBe(60);
    });

    it("allows negative means", () => {
      expect(registry.update("monocytes", "fl1Mean", -4).fl1Mean).toBe(-4);
    });

    it("rejects unknown and read-only fields", () => {
      expect(() => registry.update("monocytes", "colour", 1)).toThrow(ValidationError);
      expect(() => registry.update("monocytes", "name", "blasts")).toThrow(ValidationError);
    });

    it("names the field in the validation error", () => {
      try {
        registry.update("lymphocytes", "sscStd", -3);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.field).toBe("sscStd");
          expect(error.value).toBe(-3);
          expect(error.message).toContain("sscStd");
        }
      }
    });

    it("fails with NotFoundError for an unknown population", () => {
      expect(() => registry.update("eosinophils", "proportion", 0.2)).toThrow(NotFoundError);
    });

    it("bounds the double-positive fraction to [0, 1]", () => {
      expect(registry.update("lymphocytes", "doublePositiveFraction", 0).doublePositiveFraction).toBe(0);
      expect(() => registry.update("lymphocytes", "doublePositiveFraction", 1.5)).toThrow(ValidationError);
    });

    it("warns when proportions stop summing to 1", () => {
      registry.update("lymphocytes", "proportion", 0.5);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("register", () => {
    const blasts = {
      name: "blasts",
      proportion: 0.05,
      fscMean: 12, fscStd: 2,
      sscMean: 10, sscStd: 1,
      fl1Mean: 80, fl1Std: 9,
      fl2Mean: 20, fl2Std: 3,
    };

    it("adds a user-defined population at the end with the default double-positive fraction", () => {
      const spec = registry.register(blasts);
      expect(spec.doublePositiveFraction).toBe(0.1);
      expect(registry.names()).toEqual(["lymphocytes", "monocytes", "granulocytes", "blasts"]);
    });

    it("rejects a duplicate name", () => {
      expect(() => registry.register({ ...blasts, name: "monocytes" })).toThrow(DuplicatePopulationError);
      expect(registry.size).toBe(3);
    });

    it("rejects an invalid spec without registering it", () => {
      expect(() => registry.register({ ...blasts, fscStd: 0 })).toThrow(ValidationError);
      expect(registry.has("blasts")).toBe(false);
    });
  });

  describe("rebalance", () => {
    it("scales the other populations to fill the remaining share", () => {
      registry.update("lymphocytes", "proportion", 0.5);
      registry.rebalance("lymphocytes");

      expect(registry.get("lymphocytes").proportion).toBe(0.5);
      expect(registry.get("monocytes").proportion).toBeCloseTo(0.375, 10);
      expect(registry.get("granulocytes").proportion).toBeCloseTo(0.125, 10);
      expect(registry.proportionTotal()).toBeCloseTo(1, 10);
    });

    it("refuses to squeeze the others to zero and changes nothing", () => {
      registry.update("lymphocytes", "proportion", 1);
      expect(() => registry.rebalance("lymphocytes")).toThrow(ValidationError);
      expect(registry.get("monocytes").proportion).toBe(0.3);
      expect(registry.get("granulocytes").proportion).toBe(0.1);
    });

    it("leaves a single population untouched", () => {
      const solo = new PopulationRegistry([{ ...registry.get("monocytes"), proportion: 0.4 }]);
      solo.rebalance("monocytes");
      expect(solo.get("monocytes").proportion).toBe(0.4);
    });
  });

  it("snapshot returns frozen copies", () => {
    const snapshot = registry.snapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
    registry.update("lymphocytes", "fscMean", 9);
    expect(snapshot[0].fscMean).toBe(8);
  });

  it("reset restores the initial populations", () => {
    registry.update("lymphocytes", "fscMean", 9);
    registry.register({ ...registry.get("monocytes"), name: "blasts" });
    registry.reset();
    expect(registry.names()).toEqual(["lymphocytes", "monocytes", "granulocytes"]);
    expect(registry.get("lymphocytes").fscMean).toBe(8);
  });

  it("rejects duplicate names at construction", () => {
    const spec = registry.get("monocytes");
    expect(() => new PopulationRegistry([spec, spec])).toThrow(DuplicatePopulationError);
  });
});
