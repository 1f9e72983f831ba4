import type { Dataset, SpilloverCoefficients } from "@shared/types/cytometry";
import { cloneDataset } from "./assembly";
import { CYTOMETRY_DEFAULTS } from "./config";
import { InvalidCoefficientError } from "./errors";

export type SpilloverMatrix = [[number, number], [number, number]];

// Accepted range is 0 <= c < 1, which keeps the mixing matrix invertible.
export function validateCoefficients(coefficients: SpilloverCoefficients): void {
  for (const [key, value] of Object.entries(coefficients)) {
    if (!Number.isFinite(value)) {
      throw new InvalidCoefficientError(key, value, "must be a finite number");
    }
    if (value < 0) {
      throw new InvalidCoefficientError(key, value, "must not be negative");
    }
    if (value >= 1) {
      throw new InvalidCoefficientError(key, value, "must be below 1");
    }
  }
}

/** Rows are (FL1, FL2) observed, columns are (FL1, FL2) true signal. */
export function spilloverMatrix(coefficients: SpilloverCoefficients): SpilloverMatrix {
  validateCoefficients(coefficients);
  return [
    [1, coefficients.fl2IntoFl1],
    [coefficients.fl1IntoFl2, 1],
  ];
}

export function applySpillover(
  dataset: Dataset,
  coefficients: SpilloverCoefficients = CYTOMETRY_DEFAULTS.spillover,
): Dataset {
  const [[, c1], [c2]] = spilloverMatrix(coefficients);
  const result = cloneDataset(dataset);

  for (let i = 0; i < result.FL1.length; i++) {
    const fl1 = dataset.FL1[i];
    const fl2 = dataset.FL2[i];
    result.FL1[i] = fl1 + c1 * fl2;
    result.FL2[i] = fl2 + c2 * fl1;
  }
  return result;
}

/** Inverse of `applySpillover` with the same coefficients. */
export function compensate(
  dataset: Dataset,
  coefficients: SpilloverCoefficients = CYTOMETRY_DEFAULTS.spillover,
): Dataset {
  const [[, c1], [c2]] = spilloverMatrix(coefficients);
  const det = 1 - c1 * c2;
  const result = cloneDataset(dataset);

  for (let i = 0; i < result.FL1.length; i++) {
    const observed1 = dataset.FL1[i];
    const observed2 = dataset.FL2[i];
    result.FL1[i] = (observed1 - c1 * observed2) / det;
    result.FL2[i] = (observed2 - c2 * observed1) / det;
  }
  return result;
}
