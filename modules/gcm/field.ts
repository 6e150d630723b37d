import { ShapeMismatchError } from "../../shared/gcm-errors";
import {
  conversionFactor,
  quantityValue,
  type TQuantityInput,
  type TUnitSymbol,
} from "../../shared/unit-system";

export type Shape2D = readonly [nLon: number, nLat: number];
export type Shape3D = readonly [nLayer: number, nLon: number, nLat: number];
export type GridShape = Shape2D | Shape3D;

export const shapeSize = (shape: readonly number[]): number =>
  shape.reduce((total, extent) => total * extent, 1);

export const sameShape = (a: readonly number[], b: readonly number[]): boolean =>
  a.length === b.length && a.every((extent, i) => extent === b[i]);

const assertGridShape = (name: string, shape: readonly number[]): void => {
  const validRank = shape.length === 2 || shape.length === 3;
  if (!validRank || !shape.every((extent) => Number.isInteger(extent) && extent > 0)) {
    throw new ShapeMismatchError(name, shape);
  }
};

/**
 * One physical variable sampled on the GCM grid.
 *
 * Values are float32, row-major (last axis fastest) and expressed in `unit`.
 * The backing array never leaves the instance; `flat` hands out a copy.
 */
export class Field<S extends GridShape = GridShape> {
  private readonly values: Float32Array;

  private constructor(
    readonly name: string,
    readonly unit: TUnitSymbol,
    readonly shape: S,
    values: Float32Array,
  ) {
    this.values = values;
  }

  /** Broadcasts a scalar quantity over `shape`. */
  static constant<S extends GridShape>(
    name: string,
    unit: TUnitSymbol,
    value: TQuantityInput,
    shape: S,
  ): Field<S> {
    assertGridShape(name, shape);
    const scalar = quantityValue(value, unit);
    const values = new Float32Array(shapeSize(shape));
    values.fill(scalar);
    return new Field(name, unit, shape, values);
  }

  /** Copies a row-major grid, converting from `sourceUnit` when it differs. */
  static fromValues<S extends GridShape>(
    name: string,
    unit: TUnitSymbol,
    values: ArrayLike<number>,
    shape: S,
    sourceUnit: TUnitSymbol = unit,
  ): Field<S> {
    assertGridShape(name, shape);
    if (values.length !== shapeSize(shape)) {
      throw new ShapeMismatchError(name, [values.length], shape);
    }
    const factor = conversionFactor(sourceUnit, unit);
    const copy = Float32Array.from(values, (value) => value * factor);
    return new Field(name, unit, shape, copy);
  }

  get dims(): 2 | 3 {
    return this.shape.length;
  }

  get size(): number {
    return this.values.length;
  }

  get flat(): Float32Array {
    return this.values.slice();
  }

  at(...index: number[]): number {
    if (index.length !== this.shape.length) {
      throw new RangeError(`${this.name} takes ${this.shape.length} indices, got ${index.length}`);
    }
    let offset = 0;
    for (let axis = 0; axis < index.length; axis += 1) {
      const i = index[axis];
      const extent = this.shape[axis];
      if (!Number.isInteger(i) || i < 0 || i >= extent) {
        throw new RangeError(`${this.name} index ${i} out of range for axis ${axis} (${extent})`);
      }
      offset = offset * extent + i;
    }
    return this.values[offset];
  }

  /** Values converted to another compatible unit, same layout. */
  valuesIn(unit: TUnitSymbol): Float32Array {
    const factor = conversionFactor(this.unit, unit);
    return factor === 1 ? this.flat : this.values.map((value) => value * factor);
  }
}

export type Field2D = Field<Shape2D>;
export type Field3D = Field<Shape3D>;

export const concatFlat = (fields: readonly Field[]): Float32Array => {
  const total = fields.reduce((sum, field) => sum + field.size, 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const field of fields) {
    out.set(field.flat, offset);
    offset += field.size;
  }
  return out;
};
