/** Raw `current` block of the Open-Meteo air-quality endpoint. */
export interface RawAirQuality {
  time?: string;
  european_aqi?: number | null;
  us_aqi?: number | null;
  uv_index?: number | null;
}

export interface AirQualityRequest {
  latitude: number;
  longitude: number;
  timezone: string;
}

export interface AirQualityPort {
  /** Rejects on transport or payload failure. */
  getAirQuality(request: AirQualityRequest): Promise<RawAirQuality>;
}
