import { UnknownSpeciesError } from "./gcm-errors";

export const GAS_SPECIES = [
  "H2O",
  "CO2",
  "O3",
  "N2O",
  "CO",
  "CH4",
  "O2",
  "NO",
  "SO2",
  "NO2",
  "NH3",
  "HNO3",
  "OH",
  "N2",
  "HO2NO2",
  "N2O5",
  "O",
] as const;

export type GasSpecies = typeof GAS_SPECIES[number];

// Numeric entries are HITRAN molecule ids; strings are passed to the header verbatim.
const GAS_TYPES = {
  H2O: 1,
  CO2: 2,
  O3: 3,
  N2O: 4,
  CO: 5,
  CH4: 6,
  O2: 7,
  NO: 8,
  SO2: 9,
  NO2: 10,
  NH3: 11,
  HNO3: 12,
  OH: 13,
  N2: 22,
  HO2NO2: "SEC[26404-66-0] Peroxynitric acid",
  N2O5: "XSEC[10102-03-1] Dinitrogen pentoxide",
  O: "KZ[08] Oxygen",
} as const satisfies Record<GasSpecies, number | string>;

export const AEROSOL_SPECIES = ["Water", "WaterIce"] as const;

export type AerosolSpecies = typeof AEROSOL_SPECIES[number];

const AEROSOL_TYPES = {
  Water: "AFCRL_Water_HRI",
  WaterIce: "Warren_ice_HRI",
} as const satisfies Record<AerosolSpecies, string>;

export const isGasSpecies = (name: string): name is GasSpecies =>
  (GAS_SPECIES as readonly string[]).includes(name);

export const isAerosolSpecies = (name: string): name is AerosolSpecies =>
  (AEROSOL_SPECIES as readonly string[]).includes(name);

export const gasTypeToken = (gas: GasSpecies): string => {
  const type: number | string = GAS_TYPES[gas];
  return typeof type === "number" ? `HIT[${type}]` : type;
};

export const aerosolTypeToken = (aerosol: AerosolSpecies): string => AEROSOL_TYPES[aerosol];

export const resolveGasType = (name: string): string => {
  if (!isGasSpecies(name)) {
    throw new UnknownSpeciesError("gas", name);
  }
  return gasTypeToken(name);
};

export const resolveAerosolType = (name: string): string => {
  if (!isAerosolSpecies(name)) {
    throw new UnknownSpeciesError("aerosol", name);
  }
  return aerosolTypeToken(name);
};
