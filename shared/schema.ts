import { z } from "zod";
import type { PopulationField } from "./types/cytometry";

// Populations
export const POPULATION_FIELDS = [
  "proportion",
  "fscMean",
  "fscStd",
  "sscMean",
  "sscStd",
  "fl1Mean",
  "fl1Std",
  "fl2Mean",
  "fl2Std",
  "doublePositiveFraction",
] as const satisfies readonly PopulationField[];

const finiteNumber = z.number().finite();
const meanSchema = finiteNumber;
const stdSchema = finiteNumber.gt(0, { message: "Standard deviation must be greater than 0" });

export const populationFieldSchemas = {
  proportion: finiteNumber
    .gt(0, { message: "Proportion must be greater than 0" })
    .lte(1, { message: "Proportion must be at most 1" }),
  fscMean: meanSchema,
  fscStd: stdSchema,
  sscMean: meanSchema,
  sscStd: stdSchema,
  fl1Mean: meanSchema,
  fl1Std: stdSchema,
  fl2Mean: meanSchema,
  fl2Std: stdSchema,
  doublePositiveFraction: finiteNumber
    .min(0, { message: "Double-positive fraction must be between 0 and 1" })
    .max(1, { message: "Double-positive fraction must be between 0 and 1" }),
} satisfies Record<PopulationField, z.ZodNumber>;

export const populationFieldSchema = z.enum(POPULATION_FIELDS);

export const populationSpecSchema = z.object({
  name: z.string().trim().min(1, { message: "Population name is required" }).max(64),
  ...populationFieldSchemas,
  doublePositiveFraction: populationFieldSchemas.doublePositiveFraction.default(0.1),
});

export type PopulationSpecInput = z.input<typeof populationSpecSchema>;

// Spillover
const coefficientSchema = finiteNumber
  .min(0, { message: "Spillover coefficient must not be negative" })
  .lt(1, { message: "Spillover coefficient must be below 1" });

export const spilloverCoefficientsSchema = z.object({
  fl2IntoFl1: coefficientSchema,
  fl1IntoFl2: coefficientSchema,
});

export const doublePositiveShiftSchema = z.object({
  shiftMean: finiteNumber.gt(0, { message: "Double-positive shift mean must be greater than 0" }),
  shiftStd: finiteNumber.min(0, { message: "Double-positive shift spread must not be negative" }),
});

export const allocationPolicySchema = z.enum(["independent", "largest_remainder"]);

// Environment
export const simulatorEnvSchema = z.object({
  FLOW_SIM_SEED: z.coerce.number().int().min(0).max(0xffffffff, { message: "Seed must fit in 32 bits" }).optional(),
  FLOW_SIM_TOTAL_CELLS: z.coerce.number().int().positive().optional(),
  FLOW_SIM_SPILLOVER_FL2_INTO_FL1: z.coerce.number().optional(),
  FLOW_SIM_SPILLOVER_FL1_INTO_FL2: z.coerce.number().optional(),
  FLOW_SIM_ALLOCATION: allocationPolicySchema.optional(),
});

export type SimulatorEnv = z.infer<typeof simulatorEnvSchema>;
