export const LON_ORIGIN_DEG = -180;
export const LAT_ORIGIN_DEG = -90;

export const longitudeSpacing = (nLon: number): number => 360 / nLon;

// Matches the simulator's grid descriptor, not the spacing of the closed latitude axis.
export const latitudeSpacing = (nLat: number): number => 180 / nLat;

/** `nLon` evenly spaced longitudes over [-180, 180), degrees. */
export const longitudeAxis = (nLon: number): number[] => {
  const step = longitudeSpacing(nLon);
  return Array.from({ length: nLon }, (_, i) => LON_ORIGIN_DEG + i * step);
};

/** `nLat` evenly spaced latitudes over [-90, 90] including both poles, degrees. */
export const latitudeAxis = (nLat: number): number[] => {
  if (nLat === 1) return [LAT_ORIGIN_DEG];
  const step = 180 / (nLat - 1);
  return Array.from({ length: nLat }, (_, i) => (i === nLat - 1 ? 90 : LAT_ORIGIN_DEG + i * step));
};

export const degToRad = (deg: number): number => (deg * Math.PI) / 180;
