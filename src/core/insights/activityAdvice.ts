import { clockLabel, type OptionalNumber } from '../model/forecast.js';
import type { ActivityRanking } from '../scoring/activityRanker.js';

export interface ActivityAdviceInputs {
  temperature: OptionalNumber;
  apparentTemperature: OptionalNumber;
  uvIndexMax: OptionalNumber;
  rainProbability: OptionalNumber;
  windSpeedMax: OptionalNumber;
  /** Today's sky condition, used for the stargazing rating. */
  weatherCode: OptionalNumber;
  bestHour: string | undefined;
  ranking: ActivityRanking;
}

function outdoorComfort(feelsLike: OptionalNumber): string {
  if (feelsLike === undefined) return '• Temperature data missing – judge by how it feels.';
  if (feelsLike <= 3) return '• Feels very cold – short outdoor trips are fine, but wrap up well.';
  if (feelsLike <= 10) return '• Cool – good for walks and light activity with a coat.';
  if (feelsLike <= 24) return '• Comfortable – great for most outdoor activities.';
  if (feelsLike <= 30) return '• Warm – good, but drink water and avoid pushing too hard.';
  return '• Hot – avoid intense activity in the middle of the day, seek shade.';
}

function walkingRating(rain: OptionalNumber, feelsLike: OptionalNumber): string {
  if (rain !== undefined && rain < 40 && feelsLike !== undefined && feelsLike >= 5 && feelsLike <= 25) {
    return '• Rating: 👍 Great – comfortable temps and not too wet.';
  }
  if (rain !== undefined && rain >= 70) {
    return '• Rating: ⚠️ Tricky – walks may be wet, check the radar and bring waterproofs.';
  }
  return '• Rating: 🙂 Okay – mixed conditions, choose your time.';
}

function sportRating(wind: OptionalNumber, uv: OptionalNumber): string {
  if (wind !== undefined && wind > 60) {
    return '• Rating: ⚠️ Windy – running or cycling will feel hard, consider shorter sessions.';
  }
  if (uv !== undefined && uv >= 7) {
    return '• Rating: 🙂 Good but bright – great for sport with sun protection and plenty of water.';
  }
  return '• Rating: 👍 Generally good for outdoor exercise for most people.';
}

function stargazingRating(code: OptionalNumber): string {
  if (code === undefined) return '• Rating: ? – sky condition unknown, check visually tonight.';
  if (code === 0 || code === 1) return '• Rating: 🌟 Great – clear or mainly clear skies if light pollution is low.';
  if (code === 2 || code === 3) return '• Rating: 😐 Limited – cloud cover may block stars.';
  if (code === 45 || code === 48) return '• Rating: 👎 Poor – fog or mist will reduce visibility.';
  return '• Rating: 👎 Not ideal – precipitation or unsettled weather.';
}

export function formatActivityRanking(ranking: ActivityRanking): string {
  const { walking, sport, stargazing } = ranking;
  if (walking.length === 0 && sport.length === 0 && stargazing.length === 0) {
    return 'No hourly ranking available.';
  }
  const labels = (hours: typeof walking): string => hours.map((hour) => hour.label).join(', ');
  return [
    'Best hours today (local time):',
    `• Walking / park: ${labels(walking)}`,
    `• Sport / running: ${labels(sport)}`,
    `• Stargazing: ${labels(stargazing)}`,
  ].join('\n');
}

/** Per-activity ratings for today followed by the ranked hours. */
export function buildActivitiesText(inputs: ActivityAdviceInputs): string {
  const feelsLike = inputs.apparentTemperature ?? inputs.temperature;
  const bestHourLine = inputs.bestHour?.includes('T')
    ? `⭐ Nice outdoor hour today: around ${clockLabel(inputs.bestHour)} (local time).`
    : '⭐ No single perfect hour found today – pick your favourite calmer period.';

  return [
    ['General outdoor comfort:', outdoorComfort(feelsLike)].join('\n'),
    bestHourLine,
    ['Walking / park:', walkingRating(inputs.rainProbability, feelsLike)].join('\n'),
    ['Sports / running:', sportRating(inputs.windSpeedMax, inputs.uvIndexMax)].join('\n'),
    ['Stargazing tonight:', stargazingRating(inputs.weatherCode)].join('\n'),
    formatActivityRanking(inputs.ranking),
  ].join('\n\n');
}
