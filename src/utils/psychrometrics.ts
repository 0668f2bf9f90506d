// Psychrometric helpers for sensor reporting.
// - dew point (°C)
// - absolute humidity (g/m^3)
// - steam (vapour) pressure (hPa, numerically equal to mbar)
//
// Magnus approximations; good enough for display and logging.

function clampRh(rhPct: number): number {
  return Math.max(0, Math.min(100, rhPct));
}

/** Saturation vapour pressure over water in hPa. */
export function saturationVaporPressureHpa(tempC: number): number {
  return 6.112 * Math.exp((17.62 * tempC) / (243.12 + tempC));
}

export function steamPressureHpa(tempC: number, rhPct: number): number {
  return (clampRh(rhPct) / 100) * saturationVaporPressureHpa(tempC);
}

export function dewPointC(tempC: number, rhPct: number): number {
  const rh = Math.max(1e-6, clampRh(rhPct)) / 100;
  const a = 17.62;
  const b = 243.12; // °C

  const gamma = Math.log(rh) + (a * tempC) / (b + tempC);
  return (b * gamma) / (a - gamma);
}

export function absoluteHumidityGm3(tempC: number, rhPct: number): number {
  // AH = 216.7 * (e / (T + 273.15)), e in hPa
  return 216.7 * (steamPressureHpa(tempC, rhPct) / (tempC + 273.15));
}

export interface PsychrometricSummary {
  dew_point_c: number;
  abs_humidity_gm3: number;
  steam_pressure_mbar: number;
}

export function summarize(tempC: number, rhPct: number): PsychrometricSummary {
  return {
    dew_point_c: dewPointC(tempC, rhPct),
    abs_humidity_gm3: absoluteHumidityGm3(tempC, rhPct),
    steam_pressure_mbar: steamPressureHpa(tempC, rhPct)
  };
}
