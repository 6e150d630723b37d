/**
 * Configuration wire format read by the radiative-transfer simulator:
 *
 *   <KEY1>value1
 *   <KEY2>value2
 *   <BINARY>[float32 payload, row-major, no separators]</BINARY>
 *
 * The payload layout is only described by the ATMOSPHERE-GCM-PARAMETERS value:
 * `nLon,nLat,nLayer,lonOrigin,latOrigin,dlon,dlat,<variable tokens...>`.
 */
import { WireFormatError } from "../../shared/gcm-errors";
import { SURFACE_VARIABLE_NAMES, WINDS_TOKEN } from "./structure";

export const PSG_BINARY_OPEN = "\n<BINARY>";
export const PSG_BINARY_CLOSE = "</BINARY>";
export const GCM_PARAMETERS_KEY = "ATMOSPHERE-GCM-PARAMETERS";

export type PsgParams = Record<string, string>;

export interface PsgContent {
  params: PsgParams;
  payload: Float32Array;
}

export interface GcmGridDescriptor {
  nLon: number;
  nLat: number;
  nLayer: number;
  lonOrigin: number;
  latOrigin: number;
  dlon: number;
  dlat: number;
  variables: string[];
}

export const formatPsgParams = (params: PsgParams): string =>
  Object.entries(params)
    .map(([key, value]) => `<${key}>${value}`)
    .join("\n");

export const encodePsgContent = (params: PsgParams, payload: Float32Array): Buffer =>
  Buffer.concat([
    Buffer.from(formatPsgParams(params), "utf8"),
    Buffer.from(PSG_BINARY_OPEN, "utf8"),
    Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength),
    Buffer.from(PSG_BINARY_CLOSE, "utf8"),
  ]);

const HEADER_LINE_RE = /^<([^>]+)>(.*)$/;

export const parsePsgContent = (bytes: Uint8Array): PsgContent => {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const open = buf.indexOf(PSG_BINARY_OPEN, 0, "utf8");
  if (open < 0) {
    throw new WireFormatError("missing <BINARY> section");
  }
  const close = buf.lastIndexOf(PSG_BINARY_CLOSE, undefined, "utf8");
  const closeLength = Buffer.byteLength(PSG_BINARY_CLOSE);
  if (close < open || close + closeLength !== buf.length) {
    throw new WireFormatError("missing </BINARY> terminator");
  }

  const params: PsgParams = {};
  const header = buf.subarray(0, open).toString("utf8");
  for (const line of header.split("\n")) {
    if (!line) continue;
    const match = HEADER_LINE_RE.exec(line);
    if (!match) {
      throw new WireFormatError(`malformed header line: ${line}`);
    }
    params[match[1]] = match[2];
  }

  const start = open + Buffer.byteLength(PSG_BINARY_OPEN);
  const raw = buf.subarray(start, close);
  if (raw.length % Float32Array.BYTES_PER_ELEMENT !== 0) {
    throw new WireFormatError(`binary payload of ${raw.length} bytes is not float32-aligned`);
  }
  const payload = new Float32Array(raw.length / Float32Array.BYTES_PER_ELEMENT);
  new Uint8Array(payload.buffer).set(raw);
  return { params, payload };
};

const parseExtent = (raw: string | undefined, label: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new WireFormatError(`grid descriptor ${label} must be a positive integer, got ${raw}`);
  }
  return value;
};

const parseCoordinate = (raw: string | undefined, label: string): number => {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(value)) {
    throw new WireFormatError(`grid descriptor ${label} must be numeric, got ${raw}`);
  }
  return value;
};

export const parseGcmProperties = (text: string): GcmGridDescriptor => {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length < 7) {
    throw new WireFormatError(`grid descriptor has ${parts.length} entries, expected at least 7`);
  }
  return {
    nLon: parseExtent(parts[0], "nLon"),
    nLat: parseExtent(parts[1], "nLat"),
    nLayer: parseExtent(parts[2], "nLayer"),
    lonOrigin: parseCoordinate(parts[3], "lonOrigin"),
    latOrigin: parseCoordinate(parts[4], "latOrigin"),
    dlon: parseCoordinate(parts[5], "dlon"),
    dlat: parseCoordinate(parts[6], "dlat"),
    variables: parts.slice(7).filter((part) => part.length > 0),
  };
};

export const variableElementCount = (token: string, grid: GcmGridDescriptor): number => {
  const surface = grid.nLon * grid.nLat;
  if (token === WINDS_TOKEN) return 2 * grid.nLayer * surface;
  if (SURFACE_VARIABLE_NAMES.has(token)) return surface;
  return grid.nLayer * surface;
};

/**
 * Slices the payload into one array per variable token, in descriptor order.
 * `Winds` carries the U block followed by the V block.
 */
export const unpackGcmPayload = (
  grid: GcmGridDescriptor,
  payload: Float32Array,
): Map<string, Float32Array> => {
  const expected = grid.variables.reduce(
    (sum, token) => sum + variableElementCount(token, grid),
    0,
  );
  if (expected !== payload.length) {
    throw new WireFormatError(
      `payload holds ${payload.length} values but the descriptor declares ${expected}`,
    );
  }
  const out = new Map<string, Float32Array>();
  let offset = 0;
  for (const token of grid.variables) {
    const count = variableElementCount(token, grid);
    out.set(token, payload.slice(offset, offset + count));
    offset += count;
  }
  return out;
};
