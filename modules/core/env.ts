// Centralized environment switches for the GCM encoder
export type GcmLogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type GcmEnv = {
  description: string;
  structure: string;
  logLevel: GcmLogLevel;
  thermalMaxOrbits: number;
  thermalStepsPerOrbit: number;
};

export const GCM_DEFAULT_DESCRIPTION = "GCM atmosphere snapshot";
export const GCM_DEFAULT_STRUCTURE = "Equilibrium";
export const GCM_DEFAULT_THERMAL_MAX_ORBITS = 64;
export const GCM_DEFAULT_THERMAL_STEPS_PER_ORBIT = 3600;

const LOG_LEVELS: readonly GcmLogLevel[] = ["debug", "info", "warn", "error", "silent"];

const clampPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const parseLogLevel = (raw: string | undefined): GcmLogLevel => {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};

const nonEmpty = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
};

export const readGcmEnv = (
  env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
): GcmEnv => {
  return {
    description: nonEmpty(env.GCM_ATMOSPHERE_DESCRIPTION, GCM_DEFAULT_DESCRIPTION),
    structure: nonEmpty(env.GCM_ATMOSPHERE_STRUCTURE, GCM_DEFAULT_STRUCTURE),
    logLevel: parseLogLevel(env.GCM_LOG_LEVEL),
    thermalMaxOrbits: clampPositiveInt(env.GCM_THERMAL_MAX_ORBITS, GCM_DEFAULT_THERMAL_MAX_ORBITS),
    thermalStepsPerOrbit: clampPositiveInt(
      env.GCM_THERMAL_STEPS_PER_ORBIT,
      GCM_DEFAULT_THERMAL_STEPS_PER_ORBIT,
    ),
  };
};
