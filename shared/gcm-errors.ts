export type GcmErrorCode =
  | "missing_required_field"
  | "shape_mismatch"
  | "unit_incompatible"
  | "unknown_species"
  | "duplicate_field"
  | "config_invalid"
  | "wire_format";

export class GcmError extends Error {
  constructor(
    public readonly code: GcmErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "GcmError";
  }
}

const formatShape = (shape: readonly number[]): string => `(${shape.join(", ")})`;

export class MissingRequiredFieldError extends GcmError {
  constructor(public readonly field: string) {
    super("missing_required_field", `${field} must be provided`);
    this.name = "MissingRequiredFieldError";
  }
}

export class ShapeMismatchError extends GcmError {
  constructor(
    public readonly field: string,
    public readonly actual: readonly number[],
    public readonly expected?: readonly number[],
  ) {
    super(
      "shape_mismatch",
      expected
        ? `${field} has shape ${formatShape(actual)} but expected ${formatShape(expected)}`
        : `${field} has invalid grid shape ${formatShape(actual)}`,
    );
    this.name = "ShapeMismatchError";
  }
}

// A field whose name cannot stand in its slot; the payload is sized by name.
export class FieldNameMismatchError extends ShapeMismatchError {
  constructor(
    field: string,
    public readonly expectedName: string,
  ) {
    super(field, []);
    this.message = `${field} cannot be used here, expected ${expectedName}`;
    this.name = "FieldNameMismatchError";
  }
}

export class UnitIncompatibleError extends GcmError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super("unit_incompatible", `cannot convert "${from}" to "${to}"`);
    this.name = "UnitIncompatibleError";
  }
}

export type SpeciesKind = "gas" | "aerosol";

export class UnknownSpeciesError extends GcmError {
  constructor(
    public readonly kind: SpeciesKind,
    public readonly species: string,
  ) {
    super("unknown_species", `unknown ${kind} species "${species}"`);
    this.name = "UnknownSpeciesError";
  }
}

export class DuplicateFieldError extends GcmError {
  constructor(
    public readonly collection: string,
    public readonly field: string,
  ) {
    super("duplicate_field", `${collection} already contains a field named ${field}`);
    this.name = "DuplicateFieldError";
  }
}

export class GcmConfigError extends GcmError {
  constructor(
    public readonly section: string,
    public readonly issues: readonly string[],
  ) {
    super("config_invalid", `invalid ${section} configuration: ${issues.join("; ")}`);
    this.name = "GcmConfigError";
  }
}

export class WireFormatError extends GcmError {
  constructor(message: string) {
    super("wire_format", message);
    this.name = "WireFormatError";
  }
}
