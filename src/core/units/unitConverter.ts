export const UNIT_SYSTEMS = ['metric', 'imperial'] as const;

export type UnitSystem = (typeof UNIT_SYSTEMS)[number];

const MM_PER_INCH = 25.4;
const MPH_PER_KMH = 0.621371;

export function cToF(c: number): number;
export function cToF(c: number | undefined): number | undefined;
export function cToF(c: number | undefined): number | undefined {
  return c === undefined ? undefined : (c * 9) / 5 + 32;
}

export function fToC(f: number): number;
export function fToC(f: number | undefined): number | undefined;
export function fToC(f: number | undefined): number | undefined {
  return f === undefined ? undefined : ((f - 32) * 5) / 9;
}

export function mmToIn(mm: number): number;
export function mmToIn(mm: number | undefined): number | undefined;
export function mmToIn(mm: number | undefined): number | undefined {
  return mm === undefined ? undefined : mm / MM_PER_INCH;
}

export function kmhToMph(kmh: number): number;
export function kmhToMph(kmh: number | undefined): number | undefined;
export function kmhToMph(kmh: number | undefined): number | undefined {
  return kmh === undefined ? undefined : kmh * MPH_PER_KMH;
}

export function mphToKmh(mph: number): number;
export function mphToKmh(mph: number | undefined): number | undefined;
export function mphToKmh(mph: number | undefined): number | undefined {
  return mph === undefined ? undefined : mph / MPH_PER_KMH;
}
