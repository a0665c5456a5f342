import { cToF, kmhToMph, mmToIn, type UnitSystem } from './unitConverter.js';

const NOT_AVAILABLE = 'N/A';

/** Values arrive in metric and are converted here, at the presentation boundary. */
export function formatTemperature(celsius: number | undefined, units: UnitSystem): string {
  if (celsius === undefined) return NOT_AVAILABLE;
  return units === 'metric' ? `${celsius.toFixed(1)} °C` : `${cToF(celsius).toFixed(1)} °F`;
}

/** Compact chart-point style, e.g. `12.3°C`. */
export function formatTemperaturePoint(celsius: number, units: UnitSystem): string {
  return units === 'metric' ? `${celsius.toFixed(1)}°C` : `${cToF(celsius).toFixed(1)}°F`;
}

export function formatPrecipitation(mm: number | undefined, units: UnitSystem): string {
  if (mm === undefined) return NOT_AVAILABLE;
  return units === 'metric' ? `${mm.toFixed(1)} mm` : `${mmToIn(mm).toFixed(2)} in`;
}

export function formatWindSpeed(kmh: number | undefined, units: UnitSystem): string {
  if (kmh === undefined) return NOT_AVAILABLE;
  return units === 'metric' ? `${kmh.toFixed(1)} km/h` : `${kmhToMph(kmh).toFixed(1)} mph`;
}

export function formatPercent(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : `${value.toFixed(0)}%`;
}
