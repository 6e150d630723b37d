import { GcmConfigError, ShapeMismatchError } from "../../shared/gcm-errors";
import { quantityValue, type TQuantityInput } from "../../shared/unit-system";
import { Field, sameShape, type Field2D, type Field3D, type Shape2D, type Shape3D } from "./field";
import {
  surfaceTemperatureMap,
  type IrradiationParams,
  type ThermalSolverOptions,
} from "./thermal-map";

export const VARIABLE_NAMES = {
  surfaceTemperature: "Tsurf",
  surfacePressure: "Psurf",
  albedo: "Albedo",
  emissivity: "Emissivity",
  temperature: "Temperature",
  pressure: "Pressure",
} as const;

// Variables the simulator reads as (nLon, nLat) maps; everything else is 3-D.
export const SURFACE_VARIABLE_NAMES: ReadonlySet<string> = new Set([
  VARIABLE_NAMES.surfaceTemperature,
  VARIABLE_NAMES.surfacePressure,
  VARIABLE_NAMES.albedo,
  VARIABLE_NAMES.emissivity,
]);

export const WINDS_TOKEN = "Winds";
export const AEROSOL_SIZE_SUFFIX = "_size";

export const createWind = (name: string, value: TQuantityInput, shape: Shape3D): Field3D =>
  Field.constant(name, "m/s", value, shape);

export const createMolecule = (name: string, abundance: TQuantityInput, shape: Shape3D): Field3D =>
  Field.constant(name, "", abundance, shape);

export const createAerosol = (name: string, abundance: TQuantityInput, shape: Shape3D): Field3D =>
  Field.constant(name, "kg/kg", abundance, shape);

export const createAerosolSize = (name: string, size: TQuantityInput, shape: Shape3D): Field3D =>
  Field.constant(`${name}${AEROSOL_SIZE_SUFFIX}`, "m", size, shape);

export const constantAlbedo = (value: TQuantityInput, shape: Shape2D): Field2D =>
  Field.constant(VARIABLE_NAMES.albedo, "", value, shape);

export const constantEmissivity = (value: TQuantityInput, shape: Shape2D): Field2D =>
  Field.constant(VARIABLE_NAMES.emissivity, "", value, shape);

/**
 * Log-spaced pressure levels from `high` at layer 0 down to `low` at the top
 * layer, identical across every column.
 */
export const pressureFromLimits = (
  high: TQuantityInput,
  low: TQuantityInput,
  shape: Shape3D,
): Field3D => {
  const highBar = quantityValue(high, "bar");
  const lowBar = quantityValue(low, "bar");
  if (!(highBar > 0) || !(lowBar > 0)) {
    throw new GcmConfigError("planet.pressure", ["pressure limits must be positive"]);
  }
  const [nLayer, nLon, nLat] = shape;
  const column = nLon * nLat;
  const logHigh = Math.log10(highBar);
  const logStep = nLayer > 1 ? (Math.log10(lowBar) - logHigh) / (nLayer - 1) : 0;
  const values = new Float32Array(nLayer * column);
  for (let k = 0; k < nLayer; k += 1) {
    values.fill(Math.pow(10, logHigh + k * logStep), k * column, (k + 1) * column);
  }
  return Field.fromValues(VARIABLE_NAMES.pressure, "bar", values, shape);
};

/** Base layer of the pressure grid. */
export const surfacePressureFromPressure = (pressure: Field3D): Field2D => {
  const [, nLon, nLat] = pressure.shape;
  const base = pressure.flat.subarray(0, nLon * nLat);
  return Field.fromValues(VARIABLE_NAMES.surfacePressure, pressure.unit, base, [nLon, nLat]);
};

export const surfaceTemperatureFromIrradiation = (
  shape: Shape2D,
  params: IrradiationParams,
  options: ThermalSolverOptions,
): Field2D =>
  Field.fromValues(
    VARIABLE_NAMES.surfaceTemperature,
    "K",
    surfaceTemperatureMap(shape, params, options),
    shape,
  );

/**
 * Dry adiabat anchored at the surface: T = Tsurf * (P / Psurf)^((gamma - 1) / gamma),
 * with Psurf taken from the base layer of `pressure`.
 */
export const temperatureFromAdiabat = (
  gamma: number,
  tsurf: Field2D,
  pressure: Field3D,
): Field3D => {
  const [nLayer, nLon, nLat] = pressure.shape;
  if (!sameShape(tsurf.shape, [nLon, nLat])) {
    throw new ShapeMismatchError(tsurf.name, tsurf.shape, [nLon, nLat]);
  }
  const column = nLon * nLat;
  const exponent = (gamma - 1) / gamma;
  const surfaceK = tsurf.valuesIn("K");
  const p = pressure.flat;
  const values = new Float32Array(nLayer * column);
  for (let k = 0; k < nLayer; k += 1) {
    for (let c = 0; c < column; c += 1) {
      values[k * column + c] = surfaceK[c] * Math.pow(p[k * column + c] / p[c], exponent);
    }
  }
  return Field.fromValues(VARIABLE_NAMES.temperature, "K", values, pressure.shape);
};
