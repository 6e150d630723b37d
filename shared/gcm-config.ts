import { z } from "zod";

import { QuantityInput } from "./unit-system";

/**
 * Nested build mapping for a GCM planet:
 *
 *   shape:     { nlayer, nlon, nlat }
 *   planet:    { teff_star, r_star, r_orbit, albedo, emissivity, epsilon, gamma,
 *                pressure: { psurf, ptop }, wind: { U, V } }
 *   molecules: { <gas>: <abundance> }
 *   aerosols?: { <name>: { abn, size } }
 *
 * Sections are parsed one at a time so a malformed section is reported by name.
 */
export const GcmConfigRoot = z.object({
  shape: z.unknown(),
  planet: z.unknown(),
  molecules: z.unknown(),
  aerosols: z.unknown().optional(),
});

const GridExtent = z.coerce.number().int().positive();

export const GcmShapeSection = z.object({
  nlayer: GridExtent,
  nlon: GridExtent,
  nlat: GridExtent,
});

export const GcmPlanetSection = z
  .object({
    teff_star: QuantityInput,
    r_star: QuantityInput,
    r_orbit: QuantityInput,
    albedo: QuantityInput,
    emissivity: QuantityInput,
    // Thermal inertia parameter of the surface energy balance.
    epsilon: z.coerce.number().nonnegative(),
    gamma: z.coerce.number().positive(),
    pressure: z.object({
      psurf: QuantityInput,
      ptop: QuantityInput,
    }),
    wind: z.object({
      U: QuantityInput,
      V: QuantityInput,
    }),
  })
  .superRefine((value, ctx) => {
    if (value.gamma <= 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "gamma must be greater than 1",
        path: ["gamma"],
      });
    }
  });

export const GcmMoleculesSection = z.record(z.string().min(1), QuantityInput);

export const GcmAerosolEntry = z.object({
  abn: QuantityInput,
  size: QuantityInput,
});

export const GcmAerosolsSection = z.record(z.string().min(1), GcmAerosolEntry);
