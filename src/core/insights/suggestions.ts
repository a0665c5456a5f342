import type { OptionalNumber } from '../model/forecast.js';
import { isSnowCode, isThunderstormCode } from '../weather/weatherCodes.js';
import { isPoorAirQuality } from './airQuality.js';
import { interpretUv } from './conditions.js';

export interface SuggestionInputs {
  temperature: OptionalNumber;
  apparentTemperature: OptionalNumber;
  uvIndexMax: OptionalNumber;
  rainProbability: OptionalNumber;
  windSpeedMax: OptionalNumber;
  humidityAverage: OptionalNumber;
  /** Overall air-quality level, when known. */
  airQuality: string | undefined;
  weatherCode: OptionalNumber;
}

function clothingAdvice(feelsLike: OptionalNumber): string {
  if (feelsLike === undefined) return '• No temperature data – dress for how it feels outside.';
  if (feelsLike <= -5) return '• 🧥 Very cold: heavy winter coat, scarf, gloves, hat and warm boots.';
  if (feelsLike <= 3) return '• 🧣 Freezing: thick coat, scarf and gloves strongly recommended.';
  if (feelsLike <= 10) return '• 🧥 Chilly: coat or thick hoodie and long trousers.';
  if (feelsLike <= 18) return '• 🧥 Cool: light jacket or jumper, layers you can take off.';
  if (feelsLike <= 24) return '• 👕 Comfortable: t-shirt with a light layer.';
  if (feelsLike <= 30) return '• 🩳 Warm: light, breathable clothes and drink water.';
  return '• ☀️ Hot: very light clothing, stay hydrated and avoid long exposure in midday sun.';
}

function precipitationAdvice(rainProbability: OptionalNumber, code: OptionalNumber): string[] {
  const lines: string[] = [];
  if (rainProbability === undefined) lines.push('• Rain probability not available.');
  else if (rainProbability >= 80) lines.push('• 🌧️ Rain very likely – waterproof jacket and a good umbrella are useful.');
  else if (rainProbability >= 60) lines.push('• 🌦️ Showers likely – a compact umbrella or light raincoat is a good idea.');
  else if (rainProbability >= 30) lines.push('• 🌥️ Some risk of showers – check the sky before going out.');
  else lines.push('• 🌤️ Low chance of rain.');

  if (isSnowCode(code)) lines.push('• ❄️ Snow possible – waterproof footwear and warm socks recommended.');
  if (isThunderstormCode(code)) lines.push('• ⛈️ Thunderstorms: avoid open fields and tall isolated trees.');
  return lines;
}

function uvAdvice(uv: OptionalNumber): string[] {
  if (uv === undefined) return ['• UV data not available.'];
  const lines = [`• UV max: ${uv.toFixed(1)} (${interpretUv(uv)}).`];
  if (uv >= 8) lines.push('• 🧢 Very strong UV – sunglasses, hat and high-SPF sunscreen are essential.');
  else if (uv >= 5) lines.push('• 😎 Moderate UV – sunscreen and sunglasses recommended.');
  else if (uv >= 3) lines.push('• Low–moderate UV – sunscreen helpful if outside for hours.');
  else lines.push('• 🌙 Low UV – sunburn risk is small for most people.');
  return lines;
}

function windAdvice(windMax: OptionalNumber): string {
  if (windMax === undefined) return '• Wind data not available.';
  if (windMax >= 60) return '• 💨 Very windy/gusty – be careful cycling and with umbrellas, secure loose items.';
  if (windMax >= 35) return '• 🌬️ Windy – it will feel cooler than the temperature, windproof layer helps.';
  return '• Light to moderate wind – nothing extreme.';
}

function humidityAdvice(humidity: OptionalNumber): string {
  if (humidity === undefined) return '• Humidity data not available.';
  if (humidity >= 80) return '• 🥵 Very humid – can feel muggy, drink water and take breaks if exercising.';
  if (humidity >= 60) return '• A bit humid – can feel warmer than the air temperature.';
  if (humidity <= 35) return '• 💧 Dry air – lips and skin may dry out; lip balm or moisturiser can help.';
  return '• Comfortable humidity for most people.';
}

function airQualityAdvice(level: string | undefined): string[] {
  if (level === undefined) return ['• No air quality data available.'];
  return [
    `• Overall: ${level}.`,
    isPoorAirQuality(level)
      ? '• People with asthma or heart/lung issues should avoid heavy outdoor exercise.'
      : '• Air quality is fine for normal outdoor plans.',
  ];
}

/** Practical advice for the day, one titled section per concern. */
export function buildSuggestions(inputs: SuggestionInputs): string {
  const sections: Array<[string, string[]]> = [
    ['Clothing:', [clothingAdvice(inputs.apparentTemperature ?? inputs.temperature)]],
    ['Rain / snow:', precipitationAdvice(inputs.rainProbability, inputs.weatherCode)],
    ['Sun & UV:', uvAdvice(inputs.uvIndexMax)],
    ['Wind:', [windAdvice(inputs.windSpeedMax)]],
    ['Humidity:', [humidityAdvice(inputs.humidityAverage)]],
    ['Air quality:', airQualityAdvice(inputs.airQuality)],
  ];
  return sections.map(([title, lines]) => [title, ...lines].join('\n')).join('\n\n');
}
