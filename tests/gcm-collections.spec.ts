import { describe, expect, it } from "vitest";
import {
  DuplicateFieldError,
  FieldNameMismatchError,
  ShapeMismatchError,
  UnitIncompatibleError,
} from "../shared/gcm-errors";
import { Aerosols, Molecules, Winds } from "../modules/gcm/collections";
import type { Shape3D } from "../modules/gcm/field";
import { createAerosol, createAerosolSize, createMolecule } from "../modules/gcm/structure";

const SHAPE: Shape3D = [2, 2, 2];

describe("gcm collections: winds", () => {
  it("lays out U then V", () => {
    const winds = Winds.fromRecord({ U: 5, V: "-3 m/s" }, SHAPE);
    expect(winds.windU.name).toBe("U");
    expect(winds.windV.name).toBe("V");
    expect(winds.windU.unit).toBe("m/s");
    expect(Array.from(winds.flat)).toEqual([...new Array(8).fill(5), ...new Array(8).fill(-3)]);
  });

  it("fails on non-velocity units", () => {
    expect(() => Winds.fromRecord({ U: "5 K", V: 0 }, SHAPE)).toThrow(UnitIncompatibleError);
  });
});

describe("gcm collections: molecules", () => {
  it("preserves mapping order", () => {
    const molecules = Molecules.fromRecord({ CO2: 0.25, H2O: "0.5" }, SHAPE);
    expect(molecules.names).toEqual(["CO2", "H2O"]);
    expect(Array.from(molecules.flat)).toEqual([...new Array(8).fill(0.25), ...new Array(8).fill(0.5)]);
  });

  it("rejects duplicate species", () => {
    const h2o = createMolecule("H2O", 1e-3, SHAPE);
    expect(() => new Molecules([h2o, h2o])).toThrow(DuplicateFieldError);
  });
});

describe("gcm collections: aerosols", () => {
  it("builds abundance and size fields per species and returns the collection", () => {
    const aerosols = Aerosols.fromRecord(
      {
        Water: { abn: 0.5, size: "2 um" },
        WaterIce: { abn: 0.25, size: { value: 4, unit: "um" } },
      },
      SHAPE,
    );
    expect(aerosols.names).toEqual(["Water", "WaterIce"]);
    expect(aerosols.sizes.map((size) => size.name)).toEqual(["Water_size", "WaterIce_size"]);
    expect(aerosols.sizes[0].unit).toBe("m");

    const flat = aerosols.flat;
    expect(flat.length).toBe(2 * (2 * 2 * 2) * 2);
    expect(Array.from(flat.subarray(0, 8))).toEqual(new Array(8).fill(0.5));
    expect(Array.from(flat.subarray(8, 16))).toEqual(new Array(8).fill(0.25));
    expect(flat[16]).toBe(Math.fround(2e-6));
    expect(flat[24]).toBe(Math.fround(4e-6));
  });

  it("requires one size field per abundance field, in species order", () => {
    const water = createAerosol("Water", 1e-7, SHAPE);
    const ice = createAerosol("WaterIce", 1e-8, SHAPE);
    const waterSize = createAerosolSize("Water", "5 um", SHAPE);
    const iceSize = createAerosolSize("WaterIce", "20 um", SHAPE);

    expect(() => new Aerosols([water, ice], [waterSize])).toThrow(ShapeMismatchError);
    const swapped = () => new Aerosols([water, ice], [iceSize, waterSize]);
    expect(swapped).toThrow(ShapeMismatchError);
    expect(swapped).toThrow(FieldNameMismatchError);
    expect(swapped).toThrow("WaterIce_size cannot be used here, expected Water_size");
    expect(() => new Aerosols([water, water], [waterSize, waterSize])).toThrow(DuplicateFieldError);
    expect(new Aerosols([water, ice], [waterSize, iceSize]).names).toEqual(["Water", "WaterIce"]);
  });
});
