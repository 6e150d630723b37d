import type { z } from "zod";

import {
  GcmAerosolsSection,
  GcmConfigRoot,
  GcmMoleculesSection,
  GcmPlanetSection,
  GcmShapeSection,
} from "../../shared/gcm-config";
import { GcmConfigError } from "../../shared/gcm-errors";
import { resolveAerosolType, resolveGasType } from "../../shared/gcm-species";
import { quantityValue } from "../../shared/unit-system";
import { readGcmEnv, type GcmEnv } from "../core/env";
import { createLogger } from "../core/log";
import { Aerosols, Molecules, Winds } from "./collections";
import type { Shape2D, Shape3D } from "./field";
import { absent, present } from "./maybe";
import { Planet, type PsgHeaderOptions } from "./planet";
import {
  constantAlbedo,
  constantEmissivity,
  pressureFromLimits,
  surfacePressureFromPressure,
  surfaceTemperatureFromIrradiation,
  temperatureFromAdiabat,
} from "./structure";

const log = createLogger("gcm-builder");

export type BuildPlanetOptions = {
  env?: GcmEnv;
  header?: Partial<PsgHeaderOptions>;
};

const parseSection = <T extends z.ZodTypeAny>(section: string, schema: T, value: unknown): z.infer<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new GcmConfigError(
      section,
      result.error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return result.data;
};

/**
 * Builds a Planet from the nested configuration mapping. Each section is
 * validated on its own before any field is derived:
 *
 * - tsurf from the irradiation balance map,
 * - pressure log-spaced between psurf and ptop, psurf from its base layer,
 * - temperature from a dry adiabat anchored at tsurf,
 * - constant albedo, emissivity and winds,
 * - one constant field per gas and per aerosol abundance/size.
 */
export const buildPlanet = (input: unknown, options: BuildPlanetOptions = {}): Planet => {
  const env = options.env ?? readGcmEnv();
  const root = parseSection("root", GcmConfigRoot, input);
  const grid = parseSection("shape", GcmShapeSection, root.shape);
  const planet = parseSection("planet", GcmPlanetSection, root.planet);
  const gases = parseSection("molecules", GcmMoleculesSection, root.molecules);
  const aerosolRecord =
    root.aerosols === undefined || root.aerosols === null
      ? undefined
      : parseSection("aerosols", GcmAerosolsSection, root.aerosols);

  Object.keys(gases).forEach((name) => resolveGasType(name));
  Object.keys(aerosolRecord ?? {}).forEach((name) => resolveAerosolType(name));

  const shape2d: Shape2D = [grid.nlon, grid.nlat];
  const shape3d: Shape3D = [grid.nlayer, grid.nlon, grid.nlat];

  const bondAlbedo = quantityValue(planet.albedo, "");
  const tsurf = surfaceTemperatureFromIrradiation(
    shape2d,
    {
      starTeffK: quantityValue(planet.teff_star, "K"),
      starRadiusM: quantityValue(planet.r_star, "m"),
      orbitRadiusM: quantityValue(planet.r_orbit, "m"),
      bondAlbedo,
    },
    {
      epsilon: planet.epsilon,
      maxOrbits: env.thermalMaxOrbits,
      stepsPerOrbit: env.thermalStepsPerOrbit,
    },
  );
  const pressure = pressureFromLimits(planet.pressure.psurf, planet.pressure.ptop, shape3d);
  const psurf = surfacePressureFromPressure(pressure);
  const temperature = temperatureFromAdiabat(planet.gamma, tsurf, pressure);
  const molecules = Molecules.fromRecord(gases, shape3d);
  const aerosols = aerosolRecord ? Aerosols.fromRecord(aerosolRecord, shape3d) : undefined;

  log.debug(
    `built grid ${shape3d.join("x")} with ${molecules.molecules.length} gases` +
      ` and ${aerosols?.aerosols.length ?? 0} aerosols`,
  );

  return new Planet(
    {
      wind: present(Winds.fromRecord(planet.wind, shape3d)),
      tsurf: present(tsurf),
      psurf: present(psurf),
      albedo: present(constantAlbedo(bondAlbedo, shape2d)),
      emissivity: present(constantEmissivity(planet.emissivity, shape2d)),
      temperature: present(temperature),
      pressure: present(pressure),
      molecules: present(molecules),
      aerosols: aerosols ? present(aerosols) : absent,
    },
    {
      description: options.header?.description ?? env.description,
      structure: options.header?.structure ?? env.structure,
    },
  );
};
