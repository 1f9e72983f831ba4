export type CytometryErrorCode =
  | "validation"
  | "not_found"
  | "duplicate_population"
  | "invalid_count"
  | "empty_registry"
  | "invalid_coefficient"
  | "no_data"
  | "config";

export class CytometryError extends Error {
  constructor(public code: CytometryErrorCode, message: string) {
    super(message);
    this.name = "CytometryError";
  }
}

export class ValidationError extends CytometryError {
  constructor(
    message: string,
    public field: string,
    public value: unknown,
  ) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends CytometryError {
  constructor(public populationName: string) {
    super("not_found", `Population "${populationName}" is not registered`);
    this.name = "NotFoundError";
  }
}

export class DuplicatePopulationError extends CytometryError {
  constructor(public populationName: string) {
    super("duplicate_population", `Population "${populationName}" is already registered`);
    this.name = "DuplicatePopulationError";
  }
}

export class InvalidCountError extends CytometryError {
  constructor(public count: number) {
    super("invalid_count", `Total sample count must be a positive integer, got ${count}`);
    this.name = "InvalidCountError";
  }
}

export class EmptyRegistryError extends CytometryError {
  constructor() {
    super("empty_registry", "Cannot generate samples from an empty population registry");
    this.name = "EmptyRegistryError";
  }
}

export class InvalidCoefficientError extends CytometryError {
  constructor(
    public coefficient: string,
    public value: number,
    detail: string,
  ) {
    super("invalid_coefficient", `Invalid spillover coefficient ${coefficient}=${value}: ${detail}`);
    this.name = "InvalidCoefficientError";
  }
}

export class NoDataError extends CytometryError {
  constructor() {
    super("no_data", "No data available, run a simulation first");
    this.name = "NoDataError";
  }
}

export class ConfigError extends CytometryError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}
