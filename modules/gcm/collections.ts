import { DuplicateFieldError, FieldNameMismatchError, ShapeMismatchError } from "../../shared/gcm-errors";
import type { TQuantityInput } from "../../shared/unit-system";
import { concatFlat, type Field3D, type Shape3D } from "./field";
import {
  AEROSOL_SIZE_SUFFIX,
  createAerosol,
  createAerosolSize,
  createMolecule,
  createWind,
} from "./structure";

const assertUniqueNames = (collection: string, fields: readonly Field3D[]): void => {
  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.name)) {
      throw new DuplicateFieldError(collection, field.name);
    }
    seen.add(field.name);
  }
};

export type WindRecord = { U: TQuantityInput; V: TQuantityInput };

export class Winds {
  constructor(
    readonly windU: Field3D,
    readonly windV: Field3D,
  ) {}

  get fields(): readonly Field3D[] {
    return [this.windU, this.windV];
  }

  get flat(): Float32Array {
    return concatFlat(this.fields);
  }

  static fromRecord(record: WindRecord, shape: Shape3D): Winds {
    return new Winds(createWind("U", record.U, shape), createWind("V", record.V, shape));
  }
}

/**
 * Gas abundances, one 3-D field per species. Order is load-bearing: it is the
 * order of the gas list in the header and of the payload blocks.
 */
export class Molecules {
  readonly molecules: readonly Field3D[];

  constructor(molecules: readonly Field3D[]) {
    assertUniqueNames("molecules", molecules);
    this.molecules = [...molecules];
  }

  get names(): string[] {
    return this.molecules.map((molecule) => molecule.name);
  }

  get flat(): Float32Array {
    return concatFlat(this.molecules);
  }

  static fromRecord(record: Record<string, TQuantityInput>, shape: Shape3D): Molecules {
    return new Molecules(
      Object.entries(record).map(([name, abundance]) => createMolecule(name, abundance, shape)),
    );
  }
}

export type AerosolRecord = Record<string, { abn: TQuantityInput; size: TQuantityInput }>;

/**
 * Aerosol abundance and particle-size fields. The payload holds every
 * abundance block first, then every size block, both in species order.
 */
export class Aerosols {
  readonly aerosols: readonly Field3D[];
  readonly sizes: readonly Field3D[];

  constructor(aerosols: readonly Field3D[], sizes: readonly Field3D[]) {
    assertUniqueNames("aerosols", aerosols);
    if (aerosols.length !== sizes.length) {
      throw new ShapeMismatchError("aerosol sizes", [sizes.length], [aerosols.length]);
    }
    aerosols.forEach((aerosol, i) => {
      const expected = `${aerosol.name}${AEROSOL_SIZE_SUFFIX}`;
      if (sizes[i].name !== expected) {
        throw new FieldNameMismatchError(sizes[i].name, expected);
      }
    });
    this.aerosols = [...aerosols];
    this.sizes = [...sizes];
  }

  get names(): string[] {
    return this.aerosols.map((aerosol) => aerosol.name);
  }

  get flat(): Float32Array {
    return concatFlat([...this.aerosols, ...this.sizes]);
  }

  static fromRecord(record: AerosolRecord, shape: Shape3D): Aerosols {
    const aerosols: Field3D[] = [];
    const sizes: Field3D[] = [];
    for (const [name, entry] of Object.entries(record)) {
      aerosols.push(createAerosol(name, entry.abn, shape));
      sizes.push(createAerosolSize(name, entry.size, shape));
    }
    return new Aerosols(aerosols, sizes);
  }
}
