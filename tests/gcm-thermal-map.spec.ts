import { describe, expect, it } from "vitest";
import { AU, R_SUN } from "../shared/physics-const";
import {
  solveLatitudeBand,
  substellarTemperature,
  surfaceTemperatureMap,
  type IrradiationParams,
} from "../modules/gcm/thermal-map";

const SUN_AT_1AU: IrradiationParams = {
  starTeffK: 5772,
  starRadiusM: R_SUN,
  orbitRadiusM: AU,
  bondAlbedo: 0,
};

const options = (epsilon: number) => ({ epsilon, maxOrbits: 64, stepsPerOrbit: 3600 });

const meanFourthPower = (band: Float64Array) =>
  band.reduce((sum, tau) => sum + tau ** 4, 0) / band.length;

describe("substellar temperature", () => {
  it("scales the stellar temperature by the dilution and albedo", () => {
    expect(substellarTemperature(SUN_AT_1AU)).toBeCloseTo(393.6177, 3);
    expect(substellarTemperature({ ...SUN_AT_1AU, bondAlbedo: 0.3 })).toBeCloseTo(
      393.6177 * Math.pow(0.7, 0.25),
      3,
    );
  });
});

describe("latitude band", () => {
  it("re-radiates instantly without thermal inertia", () => {
    const band = solveLatitudeBand(4, 1, options(0));
    expect(band[0]).toBe(0);
    expect(band[1]).toBeCloseTo(8.846e-5, 7);
    expect(band[2]).toBe(1);
    expect(band[3]).toBeCloseTo(8.846e-5, 7);
  });

  it("shifts the hottest point east of the substellar point", () => {
    const band = solveLatitudeBand(36, 1, options(1));
    const hottest = band.indexOf(Math.max(...band));
    expect(hottest).toBe(20);
    expect(band[hottest]).toBeCloseTo(0.9844, 3);
    expect(band[0]).toBeCloseTo(0.5256, 3);
  });

  it("conserves energy over the orbit", () => {
    expect(meanFourthPower(solveLatitudeBand(36, 1, options(1)))).toBeCloseTo(1 / Math.PI, 3);
    expect(meanFourthPower(solveLatitudeBand(36, 0.5, options(1)))).toBeCloseTo(0.5 / Math.PI, 3);
  });

  it("flattens toward the mean temperature at high inertia", () => {
    const band = solveLatitudeBand(36, 1, options(1000));
    expect(Math.max(...band) - Math.min(...band)).toBeLessThan(0.002);
    expect(band[0]).toBeCloseTo(Math.pow(1 / Math.PI, 0.25), 3);
  });

  it("starts every band from the orbit-mean temperature", () => {
    const band = solveLatitudeBand(36, 1, { epsilon: 1, maxOrbits: 1, stepsPerOrbit: 3600 });
    expect(band[0]).toBeCloseTo(Math.pow(1 / Math.PI, 0.25), 12);
  });
});

describe("surface temperature map", () => {
  it("writes longitude-major rows in kelvin", () => {
    const map = surfaceTemperatureMap([4, 3], SUN_AT_1AU, options(0));
    expect(map).toHaveLength(12);
    // (lon 0°, lat 0°)
    expect(map[2 * 3 + 1]).toBeCloseTo(393.6177, 3);
    // (lon -180°, lat 0°)
    expect(map[0 * 3 + 1]).toBe(0);
    // both poles receive no flux
    expect(map[2 * 3 + 0]).toBeLessThan(0.1);
    expect(map[2 * 3 + 2]).toBeLessThan(0.1);
  });
});
