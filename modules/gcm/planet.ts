import {
  DuplicateFieldError,
  FieldNameMismatchError,
  GcmConfigError,
  MissingRequiredFieldError,
  ShapeMismatchError,
} from "../../shared/gcm-errors";
import { resolveAerosolType, resolveGasType } from "../../shared/gcm-species";
import { readGcmEnv } from "../core/env";
import {
  LAT_ORIGIN_DEG,
  LON_ORIGIN_DEG,
  latitudeAxis,
  latitudeSpacing,
  longitudeAxis,
  longitudeSpacing,
} from "./axes";
import type { Aerosols, Molecules, Winds } from "./collections";
import { concatFlat, sameShape, type Field, type Field2D, type Field3D, type Shape3D } from "./field";
import { absent, type Maybe } from "./maybe";
import {
  GCM_PARAMETERS_KEY,
  encodePsgContent,
  formatPsgParams,
  type PsgParams,
} from "./psg-wire";
import { VARIABLE_NAMES, WINDS_TOKEN } from "./structure";

export type PlanetInit = {
  wind?: Maybe<Winds>;
  tsurf?: Maybe<Field2D>;
  psurf?: Maybe<Field2D>;
  albedo?: Maybe<Field2D>;
  emissivity?: Maybe<Field2D>;
  temperature?: Maybe<Field3D>;
  pressure?: Maybe<Field3D>;
  molecules?: Maybe<Molecules>;
  aerosols?: Maybe<Aerosols>;
};

export type FieldRole =
  | "wind"
  | "tsurf"
  | "psurf"
  | "albedo"
  | "emissivity"
  | "temperature"
  | "pressure"
  | "molecule"
  | "aerosol"
  | "aerosol-size";

/** One variable token of the grid descriptor and the fields behind it. */
export interface LayoutEntry {
  readonly role: FieldRole;
  readonly token: string;
  readonly dims: 2 | 3;
  readonly fields: readonly Field[];
  readonly elementCount: number;
}

export interface PsgHeaderOptions {
  description: string;
  structure: string;
}

const requireField = <T>(slot: Maybe<T> | undefined, name: string): T => {
  if (slot === undefined || slot.kind === "absent") {
    throw new MissingRequiredFieldError(name);
  }
  return slot.value;
};

const expectShape = (field: Field, expected: readonly number[]): void => {
  if (!sameShape(field.shape, expected)) {
    throw new ShapeMismatchError(field.name, field.shape, expected);
  }
};

const expectName = (field: Field, expected: string): void => {
  if (field.name !== expected) {
    throw new FieldNameMismatchError(field.name, expected);
  }
};

// Tokens whose block size the reader infers from the name itself.
const RESERVED_TOKENS: ReadonlySet<string> = new Set([WINDS_TOKEN, ...Object.values(VARIABLE_NAMES)]);

const SPECIES_ROLES: ReadonlySet<FieldRole> = new Set<FieldRole>(["molecule", "aerosol", "aerosol-size"]);

const assertDistinctTokens = (layout: readonly LayoutEntry[]): void => {
  const seen = new Set<string>();
  for (const item of layout) {
    if (SPECIES_ROLES.has(item.role) && RESERVED_TOKENS.has(item.token)) {
      throw new FieldNameMismatchError(item.token, "a species name");
    }
    if (seen.has(item.token)) {
      throw new DuplicateFieldError("layout", item.token);
    }
    seen.add(item.token);
  }
};

const UNSAFE_HEADER_TEXT = /[\r\n<>]/;

const headerValue = (key: keyof PsgHeaderOptions, value: string): string => {
  if (UNSAFE_HEADER_TEXT.test(value)) {
    throw new GcmConfigError("header", [`${key} must not contain line breaks or angle brackets`]);
  }
  return value;
};

const entry = (role: FieldRole, token: string, fields: readonly Field[]): LayoutEntry => ({
  role,
  token,
  dims: fields[0].dims,
  fields,
  elementCount: fields.reduce((sum, field) => sum + field.size, 0),
});

/**
 * GCM snapshot aggregate. Construction validates every grid shape against the
 * pressure (3-D) and surface pressure (2-D) fields, the name of every fixed slot
 * and the uniqueness of the layout tokens; an instance that exists is consistent,
 * so the accessors below never re-check.
 *
 * `layout` fixes the variable order once. The grid descriptor, the parameter
 * table and the binary payload are all read from it.
 */
export class Planet {
  readonly wind: Maybe<Winds>;
  readonly tsurf: Maybe<Field2D>;
  readonly psurf: Field2D;
  readonly albedo: Maybe<Field2D>;
  readonly emissivity: Maybe<Field2D>;
  readonly temperature: Maybe<Field3D>;
  readonly pressure: Field3D;
  readonly molecules: Maybe<Molecules>;
  readonly aerosols: Maybe<Aerosols>;
  readonly layout: readonly LayoutEntry[];
  private readonly header: PsgHeaderOptions;

  constructor(init: PlanetInit, header: Partial<PsgHeaderOptions> = {}) {
    this.pressure = requireField(init.pressure, "pressure");
    this.psurf = requireField(init.psurf, "psurf");
    this.wind = init.wind ?? absent;
    this.tsurf = init.tsurf ?? absent;
    this.albedo = init.albedo ?? absent;
    this.emissivity = init.emissivity ?? absent;
    this.temperature = init.temperature ?? absent;
    this.molecules = init.molecules ?? absent;
    this.aerosols = init.aerosols ?? absent;
    this.validate();
    this.layout = this.buildLayout();
    assertDistinctTokens(this.layout);

    const env = readGcmEnv();
    this.header = {
      description: headerValue("description", header.description ?? env.description),
      structure: headerValue("structure", header.structure ?? env.structure),
    };
  }

  validate(): void {
    const shape3d = this.pressure.shape;
    const shape2d = [shape3d[1], shape3d[2]];
    expectName(this.pressure, VARIABLE_NAMES.pressure);
    expectName(this.psurf, VARIABLE_NAMES.surfacePressure);
    expectShape(this.psurf, shape2d);
    if (this.wind.kind === "present") {
      expectShape(this.wind.value.windU, shape3d);
      expectShape(this.wind.value.windV, shape3d);
    }
    const surfaceSlots: [Maybe<Field2D>, string][] = [
      [this.tsurf, VARIABLE_NAMES.surfaceTemperature],
      [this.albedo, VARIABLE_NAMES.albedo],
      [this.emissivity, VARIABLE_NAMES.emissivity],
    ];
    for (const [slot, name] of surfaceSlots) {
      if (slot.kind === "present") {
        expectName(slot.value, name);
        expectShape(slot.value, shape2d);
      }
    }
    if (this.temperature.kind === "present") {
      expectName(this.temperature.value, VARIABLE_NAMES.temperature);
      expectShape(this.temperature.value, shape3d);
    }
    if (this.molecules.kind === "present") {
      for (const molecule of this.molecules.value.molecules) expectShape(molecule, shape3d);
    }
    if (this.aerosols.kind === "present") {
      for (const aerosol of this.aerosols.value.aerosols) expectShape(aerosol, shape3d);
      for (const size of this.aerosols.value.sizes) expectShape(size, shape3d);
    }
  }

  private buildLayout(): LayoutEntry[] {
    const layout: LayoutEntry[] = [];
    if (this.wind.kind === "present") {
      layout.push(entry("wind", WINDS_TOKEN, this.wind.value.fields));
    }
    if (this.tsurf.kind === "present") {
      layout.push(entry("tsurf", this.tsurf.value.name, [this.tsurf.value]));
    }
    layout.push(entry("psurf", this.psurf.name, [this.psurf]));
    if (this.albedo.kind === "present") {
      layout.push(entry("albedo", this.albedo.value.name, [this.albedo.value]));
    }
    if (this.emissivity.kind === "present") {
      layout.push(entry("emissivity", this.emissivity.value.name, [this.emissivity.value]));
    }
    if (this.temperature.kind === "present") {
      layout.push(entry("temperature", this.temperature.value.name, [this.temperature.value]));
    }
    layout.push(entry("pressure", this.pressure.name, [this.pressure]));
    if (this.molecules.kind === "present") {
      for (const molecule of this.molecules.value.molecules) {
        layout.push(entry("molecule", molecule.name, [molecule]));
      }
    }
    if (this.aerosols.kind === "present") {
      for (const aerosol of this.aerosols.value.aerosols) {
        layout.push(entry("aerosol", aerosol.name, [aerosol]));
      }
      for (const size of this.aerosols.value.sizes) {
        layout.push(entry("aerosol-size", size.name, [size]));
      }
    }
    return layout;
  }

  get shape(): Shape3D {
    const [nLayer, nLon, nLat] = this.pressure.shape;
    return [nLayer, nLon, nLat];
  }

  get lons(): number[] {
    return longitudeAxis(this.shape[1]);
  }

  get lats(): number[] {
    return latitudeAxis(this.shape[2]);
  }

  get dlon(): number {
    return longitudeSpacing(this.shape[1]);
  }

  get dlat(): number {
    return latitudeSpacing(this.shape[2]);
  }

  private tokensFor(role: FieldRole): string[] {
    return this.layout.filter((item) => item.role === role).map((item) => item.token);
  }

  get gcmProperties(): string {
    const [nLayer, nLon, nLat] = this.shape;
    const coords = [
      String(nLon),
      String(nLat),
      String(nLayer),
      LON_ORIGIN_DEG.toFixed(1),
      LAT_ORIGIN_DEG.toFixed(1),
      this.dlon.toFixed(2),
      this.dlat.toFixed(2),
    ];
    return [...coords, ...this.layout.map((item) => item.token)].join(",");
  }

  get psgParams(): PsgParams {
    const gases = this.tokensFor("molecule");
    const aerosols = this.tokensFor("aerosol");
    const params: PsgParams = {
      "ATMOSPHERE-DESCRIPTION": this.header.description,
      "ATMOSPHERE-STRUCTURE": this.header.structure,
      "ATMOSPHERE-LAYERS": String(this.shape[0]),
      "ATMOSPHERE-NGAS": String(gases.length),
      "ATMOSPHERE-GAS": gases.join(","),
      "ATMOSPHERE-TYPE": gases.map(resolveGasType).join(","),
      "ATMOSPHERE-ABUN": gases.map(() => "1").join(","),
      "ATMOSPHERE-UNIT": gases.map(() => "scl").join(","),
      [GCM_PARAMETERS_KEY]: this.gcmProperties,
    };
    if (aerosols.length > 0) {
      params["ATMOSPHERE-NAERO"] = String(aerosols.length);
      params["ATMOSPHERE-AEROS"] = aerosols.join(",");
      params["ATMOSPHERE-ATYPE"] = aerosols.map(resolveAerosolType).join(",");
      params["ATMOSPHERE-AABUN"] = aerosols.map(() => "1").join(",");
      params["ATMOSPHERE-AUNIT"] = aerosols.map(() => "scl").join(",");
      params["ATMOSPHERE-ASIZE"] = aerosols.map(() => "1").join(",");
      params["ATMOSPHERE-ASUNI"] = aerosols.map(() => "scl").join(",");
    }
    return params;
  }

  get flat(): Float32Array {
    return concatFlat(this.layout.flatMap((item) => item.fields));
  }

  get headerText(): string {
    return formatPsgParams(this.psgParams);
  }

  get content(): Buffer {
    return encodePsgContent(this.psgParams, this.flat);
  }
}
