import { degToRad, latitudeAxis, longitudeAxis } from "./axes";
import type { Shape2D } from "./field";

export interface IrradiationParams {
  starTeffK: number;
  starRadiusM: number;
  orbitRadiusM: number;
  bondAlbedo: number;
}

export interface ThermalSolverOptions {
  // Thermal inertia parameter; 0 means instantaneous re-radiation.
  epsilon: number;
  maxOrbits: number;
  stepsPerOrbit: number;
  tolerance?: number;
}

const DEFAULT_TOLERANCE = 1e-6;
const NEWTON_MAX_ITER = 50;

/**
 * Temperature at the substellar point of a planet in local radiative
 * equilibrium: Teff * sqrt(R_star / a) * (1 - A)^(1/4).
 */
export const substellarTemperature = (params: IrradiationParams): number =>
  params.starTeffK *
  Math.sqrt(params.starRadiusM / params.orbitRadiusM) *
  Math.pow(1 - params.bondAlbedo, 0.25);

const forcing = (lonRad: number, latScale: number) => latScale * Math.max(Math.cos(lonRad), 0);

/**
 * Backward-Euler step of  dτ/dφ = (F - τ⁴) / ε  with h = dφ / ε.
 * Solves x + h x⁴ = τ + h F by Newton; the left side is increasing for x ≥ 0.
 */
const implicitStep = (tau: number, force: number, h: number): number => {
  const rhs = tau + h * force;
  let x = Math.max(tau, 0);
  for (let iter = 0; iter < NEWTON_MAX_ITER; iter += 1) {
    const x3 = x * x * x;
    const g = x + h * x3 * x - rhs;
    const next = Math.max(x - g / (1 + 4 * h * x3), 0);
    if (Math.abs(next - x) < 1e-12) return next;
    x = next;
  }
  return x;
};

/**
 * Dimensionless temperature around one latitude circle, sampled at `nLon`
 * longitudes starting from -180°. The surface moves toward increasing
 * longitude; the substellar point sits at 0°.
 */
export const solveLatitudeBand = (
  nLon: number,
  latScale: number,
  options: ThermalSolverOptions,
): Float64Array => {
  const lons = longitudeAxis(nLon).map(degToRad);
  const out = new Float64Array(nLon);
  if (options.epsilon === 0) {
    for (let i = 0; i < nLon; i += 1) {
      out[i] = Math.pow(forcing(lons[i], latScale), 0.25);
    }
    return out;
  }

  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const substeps = Math.max(1, Math.ceil(options.stepsPerOrbit / nLon));
  const dPhi = (2 * Math.PI) / nLon / substeps;
  const h = dPhi / options.epsilon;

  let tau = Math.pow(latScale / Math.PI, 0.25);
  const previous = new Float64Array(nLon).fill(Number.NaN);
  for (let orbit = 0; orbit < options.maxOrbits; orbit += 1) {
    let change = 0;
    for (let i = 0; i < nLon; i += 1) {
      out[i] = tau;
      change = Math.max(change, Math.abs(tau - previous[i]));
      for (let s = 1; s <= substeps; s += 1) {
        tau = implicitStep(tau, forcing(lons[i] + s * dPhi, latScale), h);
      }
    }
    if (change < tolerance) break;
    previous.set(out);
  }
  return out;
};

/**
 * Surface temperature map (K) on a (nLon, nLat) grid, row-major.
 */
export const surfaceTemperatureMap = (
  shape: Shape2D,
  params: IrradiationParams,
  options: ThermalSolverOptions,
): Float32Array => {
  const [nLon, nLat] = shape;
  const t0 = substellarTemperature(params);
  const lats = latitudeAxis(nLat).map(degToRad);
  const out = new Float32Array(nLon * nLat);
  for (let j = 0; j < nLat; j += 1) {
    const band = solveLatitudeBand(nLon, Math.max(Math.cos(lats[j]), 0), options);
    for (let i = 0; i < nLon; i += 1) {
      out[i * nLat + j] = t0 * band[i];
    }
  }
  return out;
};
