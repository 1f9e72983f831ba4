import { fromError } from "zod-validation-error";
import {
  populationFieldSchema,
  populationFieldSchemas,
  populationSpecSchema,
  type PopulationSpecInput,
} from "@shared/schema";
import type { PopulationField, PopulationSpec } from "@shared/types/cytometry";
import { CYTOMETRY_DEFAULTS, DEFAULT_POPULATIONS } from "./config";
import { DuplicatePopulationError, NotFoundError, ValidationError } from "./errors";

function copySpec(spec: PopulationSpec): PopulationSpec {
  return { ...spec };
}

function parseSpec(input: PopulationSpecInput): PopulationSpec {
  const result = populationSpecSchema.safeParse(input);
  if (!result.success) {
    const field = result.error.issues[0]?.path.join(".") || "population";
    throw new ValidationError(fromError(result.error).toString(), field, input);
  }
  return result.data;
}

function parseField(field: string): PopulationField {
  const result = populationFieldSchema.safeParse(field);
  if (!result.success) {
    throw new ValidationError(`Unknown or read-only population field "${field}"`, field, field);
  }
  return result.data;
}

function parseFieldValue(field: PopulationField, value: unknown): number {
  const result = populationFieldSchemas[field].safeParse(value);
  if (!result.success) {
    throw new ValidationError(`${field}: ${fromError(result.error).toString()}`, field, value);
  }
  return result.data;
}

/**
 * Owns the per-population parameter set for one simulation session.
 * Specs handed out are copies; the only way to change one is `update`.
 */
export class PopulationRegistry {
  private populations = new Map<string, PopulationSpec>();
  private initial: PopulationSpec[];

  constructor(initial: readonly PopulationSpecInput[] = DEFAULT_POPULATIONS) {
    this.initial = initial.map(parseSpec);
    this.reset();
  }

  get size(): number {
    return this.populations.size;
  }

  has(name: string): boolean {
    return this.populations.has(name);
  }

  names(): string[] {
    return Array.from(this.populations.keys());
  }

  get(name: string): PopulationSpec {
    const spec = this.populations.get(name);
    if (!spec) throw new NotFoundError(name);
    return copySpec(spec);
  }

  list(): PopulationSpec[] {
    return Array.from(this.populations.values(), copySpec);
  }

  snapshot(): readonly Readonly<PopulationSpec>[] {
    return Object.freeze(this.list().map((spec) => Object.freeze(spec)));
  }

  register(input: PopulationSpecInput): PopulationSpec {
    const spec = parseSpec(input);
    if (this.populations.has(spec.name)) {
      throw new DuplicatePopulationError(spec.name);
    }
    this.populations.set(spec.name, spec);
    this.warnOnProportionDrift();
    return copySpec(spec);
  }

  update(name: string, field: string, value: unknown): PopulationSpec {
    const current = this.populations.get(name);
    if (!current) throw new NotFoundError(name);

    const key = parseField(field);
    const parsed = parseFieldValue(key, value);

    const updated = copySpec(current);
    updated[key] = parsed;
    this.populations.set(name, updated);
    if (key === "proportion") this.warnOnProportionDrift();
    return copySpec(updated);
  }

  proportionTotal(): number {
    let total = 0;
    for (const spec of this.populations.values()) total += spec.proportion;
    return total;
  }

  /**
   * Keeps `name` at its current proportion and scales every other population
   * so the proportions sum to 1.
   */
  rebalance(name: string): PopulationSpec[] {
    const anchor = this.populations.get(name);
    if (!anchor) throw new NotFoundError(name);

    const others = Array.from(this.populations.values()).filter((p) => p.name !== name);
    if (others.length === 0) return this.list();

    const remaining = 1 - anchor.proportion;
    if (remaining <= 0) {
      throw new ValidationError(
        `Cannot rebalance around "${name}": its proportion of ${anchor.proportion} leaves nothing for the other populations`,
        "proportion",
        anchor.proportion,
      );
    }

    const otherTotal = others.reduce((sum, p) => sum + p.proportion, 0);
    const scaled = others.map((p) => ({
      ...p,
      proportion: (p.proportion / otherTotal) * remaining,
    }));
    for (const spec of scaled) {
      parseFieldValue("proportion", spec.proportion);
    }

    for (const spec of scaled) this.populations.set(spec.name, spec);
    return this.list();
  }

  reset(): void {
    const next = new Map<string, PopulationSpec>();
    for (const spec of this.initial) {
      if (next.has(spec.name)) throw new DuplicatePopulationError(spec.name);
      next.set(spec.name, copySpec(spec));
    }
    this.populations = next;
  }

  private warnOnProportionDrift(): void {
    const total = this.proportionTotal();
    if (Math.abs(total - 1) > CYTOMETRY_DEFAULTS.proportionTolerance) {
      console.warn(`[Registry] Population proportions sum to ${total.toFixed(4)}, not 1; counts will not add up to the requested total`);
    }
  }
}
