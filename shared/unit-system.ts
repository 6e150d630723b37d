import { z } from "zod";

import { UnitIncompatibleError } from "./gcm-errors";
import { ATM, AU, BAR, R_EARTH, R_JUPITER, R_SUN } from "./physics-const";

/**
 * Unit-system contract for GCM quantities.
 *
 * Every quantity entering a field is a number tagged with one of the symbols
 * below. Conversion multiplies by the ratio of SI scales and is only allowed
 * between symbols with identical dimension exponents
 * (length, mass, time, temperature).
 */
export const UNIT_SYMBOLS = [
  "",
  "kg/kg",
  "mol/mol",
  "%",
  "ppm",
  "ppb",
  "m",
  "cm",
  "km",
  "um",
  "nm",
  "AU",
  "R_sun",
  "R_earth",
  "R_jup",
  "K",
  "Pa",
  "hPa",
  "mbar",
  "bar",
  "atm",
  "m/s",
  "cm/s",
  "km/s",
] as const;

export const UnitSymbol = z.enum(UNIT_SYMBOLS);

export type TUnitSymbol = z.infer<typeof UnitSymbol>;

type Dimension = readonly [length: number, mass: number, time: number, temperature: number];

interface UnitDefinition {
  dimension: Dimension;
  scale: number;
}

const DIMENSIONLESS: Dimension = [0, 0, 0, 0];
const LENGTH: Dimension = [1, 0, 0, 0];
const TEMPERATURE: Dimension = [0, 0, 0, 1];
const PRESSURE: Dimension = [-1, 1, -2, 0];
const VELOCITY: Dimension = [1, 0, -1, 0];

const UNIT_TABLE: Record<TUnitSymbol, UnitDefinition> = {
  "": { dimension: DIMENSIONLESS, scale: 1 },
  "kg/kg": { dimension: DIMENSIONLESS, scale: 1 },
  "mol/mol": { dimension: DIMENSIONLESS, scale: 1 },
  "%": { dimension: DIMENSIONLESS, scale: 1e-2 },
  ppm: { dimension: DIMENSIONLESS, scale: 1e-6 },
  ppb: { dimension: DIMENSIONLESS, scale: 1e-9 },
  m: { dimension: LENGTH, scale: 1 },
  cm: { dimension: LENGTH, scale: 1e-2 },
  km: { dimension: LENGTH, scale: 1e3 },
  um: { dimension: LENGTH, scale: 1e-6 },
  nm: { dimension: LENGTH, scale: 1e-9 },
  AU: { dimension: LENGTH, scale: AU },
  R_sun: { dimension: LENGTH, scale: R_SUN },
  R_earth: { dimension: LENGTH, scale: R_EARTH },
  R_jup: { dimension: LENGTH, scale: R_JUPITER },
  K: { dimension: TEMPERATURE, scale: 1 },
  Pa: { dimension: PRESSURE, scale: 1 },
  hPa: { dimension: PRESSURE, scale: 1e2 },
  mbar: { dimension: PRESSURE, scale: 1e2 },
  bar: { dimension: PRESSURE, scale: BAR },
  atm: { dimension: PRESSURE, scale: ATM },
  "m/s": { dimension: VELOCITY, scale: 1 },
  "cm/s": { dimension: VELOCITY, scale: 1e-2 },
  "km/s": { dimension: VELOCITY, scale: 1e3 },
};

const UNIT_ALIASES = new Map<string, TUnitSymbol>([
  ["dimensionless", ""],
  ["micron", "um"],
  ["au", "AU"],
  ["Rsun", "R_sun"],
  ["Rearth", "R_earth"],
  ["Rjup", "R_jup"],
  ["m s-1", "m/s"],
  ["km s-1", "km/s"],
  ["cm s-1", "cm/s"],
]);

export const isUnitSymbol = (value: string): value is TUnitSymbol =>
  (UNIT_SYMBOLS as readonly string[]).includes(value);

export const resolveUnit = (symbol: string): TUnitSymbol => {
  const trimmed = symbol.trim();
  if (isUnitSymbol(trimmed)) return trimmed;
  const alias = UNIT_ALIASES.get(trimmed);
  if (alias !== undefined) return alias;
  throw new UnitIncompatibleError(trimmed, "a known unit");
};

export const sameDimension = (a: TUnitSymbol, b: TUnitSymbol): boolean => {
  const da = UNIT_TABLE[a].dimension;
  const db = UNIT_TABLE[b].dimension;
  return da.every((exponent, i) => exponent === db[i]);
};

/**
 * Factor that turns a value expressed in `from` into one expressed in `to`.
 */
export const conversionFactor = (from: TUnitSymbol, to: TUnitSymbol): number => {
  if (from === to) return 1;
  if (!sameDimension(from, to)) {
    throw new UnitIncompatibleError(from, to);
  }
  return UNIT_TABLE[from].scale / UNIT_TABLE[to].scale;
};

export interface Quantity {
  value: number;
  unit: TUnitSymbol;
}

/**
 * Accepted quantity spellings: a bare number (implies the target unit),
 * `"<number> <unit>"` (no unit means dimensionless) or `{ value, unit }`.
 */
export const QuantityInput = z.union([
  z.number().finite(),
  z.string().min(1),
  z.object({ value: z.number().finite(), unit: z.string() }),
]);

export type TQuantityInput = z.infer<typeof QuantityInput>;

const QUANTITY_RE = /^\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)\s*(.*?)\s*$/;

export const parseQuantity = (input: TQuantityInput, impliedUnit: TUnitSymbol): Quantity => {
  if (typeof input === "number") {
    return { value: input, unit: impliedUnit };
  }
  if (typeof input === "string") {
    const match = QUANTITY_RE.exec(input);
    if (!match) {
      throw new UnitIncompatibleError(input, impliedUnit);
    }
    return { value: Number(match[1]), unit: resolveUnit(match[2]) };
  }
  return { value: input.value, unit: resolveUnit(input.unit) };
};

export const toValue = (quantity: Quantity, unit: TUnitSymbol): number =>
  quantity.value * conversionFactor(quantity.unit, unit);

export const quantityValue = (input: TQuantityInput, unit: TUnitSymbol): number =>
  toValue(parseQuantity(input, unit), unit);
