/**
 * Physics constants (shared).
 *
 * Keeps unit conversion, irradiation and the CLI numerically consistent.
 * Values follow the IAU 2012/2015 nominal constants where applicable.
 */

// Astronomical unit (m).
export const AU = 1.495_978_707e11;

// Nominal solar radius (m).
export const R_SUN = 6.957e8;

// Equatorial Earth and Jupiter radii (m).
export const R_EARTH = 6.378_1e6;
export const R_JUPITER = 7.149_2e7;

// Pressure (Pa).
export const BAR = 1e5;
export const ATM = 101_325;
