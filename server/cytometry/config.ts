import { fromError } from "zod-validation-error";
import { doublePositiveShiftSchema, simulatorEnvSchema, spilloverCoefficientsSchema } from "@shared/schema";
import type {
  AllocationPolicy,
  DoublePositiveShift,
  PopulationSpec,
  SpilloverCoefficients,
} from "@shared/types/cytometry";
import { ConfigError } from "./errors";

export const DEFAULT_POPULATIONS: readonly PopulationSpec[] = [
  {
    name: "lymphocytes",
    proportion: 0.6,
    fscMean: 8, fscStd: 1.5,
    sscMean: 15, sscStd: 2,
    fl1Mean: 30, fl1Std: 5,
    fl2Mean: 10, fl2Std: 2,
    doublePositiveFraction: 0.1,
  },
  {
    name: "monocytes",
    proportion: 0.3,
    fscMean: 15, fscStd: 3,
    sscMean: 25, sscStd: 3,
    fl1Mean: 60, fl1Std: 8,
    fl2Mean: 30, fl2Std: 5,
    doublePositiveFraction: 0.1,
  },
  {
    name: "granulocytes",
    proportion: 0.1,
    fscMean: 20, fscStd: 4,
    sscMean: 35, sscStd: 4,
    fl1Mean: 40, fl1Std: 6,
    fl2Mean: 50, fl2Std: 7,
    doublePositiveFraction: 0.1,
  },
];

export const CYTOMETRY_DEFAULTS = {
  totalCells: 10000,
  spillover: { fl2IntoFl1: 0.1, fl1IntoFl2: 0.05 },
  doublePositiveShift: { shiftMean: 20, shiftStd: 5 },
  allocation: "independent",
  histogramBins: 100,
  proportionTolerance: 1e-6,
} as const;

export interface SimulatorConfig {
  seed?: number;
  totalCells: number;
  spillover: SpilloverCoefficients;
  doublePositiveShift: DoublePositiveShift;
  allocation: AllocationPolicy;
  populations: readonly PopulationSpec[];
}

export function defaultSimulatorConfig(): SimulatorConfig {
  return {
    totalCells: CYTOMETRY_DEFAULTS.totalCells,
    spillover: { ...CYTOMETRY_DEFAULTS.spillover },
    doublePositiveShift: { ...CYTOMETRY_DEFAULTS.doublePositiveShift },
    allocation: CYTOMETRY_DEFAULTS.allocation,
    populations: DEFAULT_POPULATIONS,
  };
}

export function parseDoublePositiveShift(shift: DoublePositiveShift): DoublePositiveShift {
  const result = doublePositiveShiftSchema.safeParse(shift);
  if (!result.success) {
    throw new ConfigError(fromError(result.error).toString());
  }
  return result.data;
}

type EnvSource = Record<string, string | undefined>;

function dropBlank(env: EnvSource): EnvSource {
  const cleaned: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }
  return cleaned;
}

export function loadSimulatorConfig(
  env: EnvSource = process.env,
  overrides: Partial<SimulatorConfig> = {},
): SimulatorConfig {
  const parsed = simulatorEnvSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new ConfigError(fromError(parsed.error).toString());
  }

  const base = defaultSimulatorConfig();
  const fromEnv = parsed.data;

  const spillover = overrides.spillover ?? {
    fl2IntoFl1: fromEnv.FLOW_SIM_SPILLOVER_FL2_INTO_FL1 ?? base.spillover.fl2IntoFl1,
    fl1IntoFl2: fromEnv.FLOW_SIM_SPILLOVER_FL1_INTO_FL2 ?? base.spillover.fl1IntoFl2,
  };
  const spilloverResult = spilloverCoefficientsSchema.safeParse(spillover);
  if (!spilloverResult.success) {
    throw new ConfigError(fromError(spilloverResult.error).toString());
  }

  return {
    seed: overrides.seed ?? fromEnv.FLOW_SIM_SEED,
    totalCells: overrides.totalCells ?? fromEnv.FLOW_SIM_TOTAL_CELLS ?? base.totalCells,
    spillover: spilloverResult.data,
    doublePositiveShift: parseDoublePositiveShift(overrides.doublePositiveShift ?? base.doublePositiveShift),
    allocation: overrides.allocation ?? fromEnv.FLOW_SIM_ALLOCATION ?? base.allocation,
    populations: overrides.populations ?? base.populations,
  };
}
