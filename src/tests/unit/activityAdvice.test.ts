import { describe, it, expect } from 'vitest';
import { buildActivitiesText, formatActivityRanking, type ActivityAdviceInputs } from '../../core/insights/activityAdvice.js';
import type { ActivityRanking } from '../../core/scoring/activityRanker.js';

const ranking: ActivityRanking = {
  walking: [
    { time: '2026-10-19T12:00', label: '12:00', score: 90 },
    { time: '2026-10-19T09:00', label: '09:00', score: 80 },
  ],
  sport: [{ time: '2026-10-19T09:00', label: '09:00', score: 85 }],
  stargazing: [{ time: '2026-10-19T21:00', label: '21:00', score: 70 }],
};

const pleasantDay: ActivityAdviceInputs = {
  temperature: 16,
  apparentTemperature: 15,
  uvIndexMax: 5,
  rainProbability: 30,
  windSpeedMax: 28,
  weatherCode: 1,
  bestHour: '2026-10-19T12:00',
  ranking,
};

describe('formatActivityRanking', () => {
  it('lists the ranked hours per activity', () => {
    expect(formatActivityRanking(ranking)).toBe(
      [
        'Best hours today (local time):',
        '• Walking / park: 12:00, 09:00',
        '• Sport / running: 09:00',
        '• Stargazing: 21:00',
      ].join('\n')
    );
  });

  it('reports an empty ranking', () => {
    expect(formatActivityRanking({ walking: [], sport: [], stargazing: [] })).toBe('No hourly ranking available.');
  });
});

describe('buildActivitiesText', () => {
  it('rates each activity and appends the ranking', () => {
    expect(buildActivitiesText(pleasantDay)).toBe(
      [
        'General outdoor comfort:\n• Comfortable – great for most outdoor activities.',
        '⭐ Nice outdoor hour today: around 12:00 (local time).',
        'Walking / park:\n• Rating: 👍 Great – comfortable temps and not too wet.',
        'Sports / running:\n• Rating: 👍 Generally good for outdoor exercise for most people.',
        'Stargazing tonight:\n• Rating: 🌟 Great – clear or mainly clear skies if light pollution is low.',
        formatActivityRanking(ranking),
      ].join('\n\n')
    );
  });

  it('warns about wet, windy and foggy days', () => {
    const sections = buildActivitiesText({
      ...pleasantDay,
      rainProbability: 75,
      windSpeedMax: 65,
      weatherCode: 45,
      bestHour: undefined,
    }).split('\n\n');

    expect(sections.slice(1, 5)).toEqual([
      '⭐ No single perfect hour found today – pick your favourite calmer period.',
      'Walking / park:\n• Rating: ⚠️ Tricky – walks may be wet, check the radar and bring waterproofs.',
      'Sports / running:\n• Rating: ⚠️ Windy – running or cycling will feel hard, consider shorter sessions.',
      'Stargazing tonight:\n• Rating: 👎 Poor – fog or mist will reduce visibility.',
    ]);
  });

  it('notes bright sport conditions and cloudy nights', () => {
    const sections = buildActivitiesText({ ...pleasantDay, uvIndexMax: 7, weatherCode: 3 }).split('\n\n');

    expect(sections[3]).toBe(
      'Sports / running:\n• Rating: 🙂 Good but bright – great for sport with sun protection and plenty of water.'
    );
    expect(sections[4]).toBe('Stargazing tonight:\n• Rating: 😐 Limited – cloud cover may block stars.');
  });

  it.each([
    [-2, '• Feels very cold – short outdoor trips are fine, but wrap up well.'],
    [8, '• Cool – good for walks and light activity with a coat.'],
    [28, '• Warm – good, but drink water and avoid pushing too hard.'],
    [33, '• Hot – avoid intense activity in the middle of the day, seek shade.'],
  ] as const)('describes comfort when it feels like %d', (feelsLike, line) => {
    const sections = buildActivitiesText({ ...pleasantDay, apparentTemperature: feelsLike }).split('\n\n');

    expect(sections[0]).toBe(`General outdoor comfort:\n${line}`);
  });

  it('handles missing readings', () => {
    const sections = buildActivitiesText({
      ...pleasantDay,
      temperature: undefined,
      apparentTemperature: undefined,
      rainProbability: undefined,
      weatherCode: undefined,
    }).split('\n\n');

    expect(sections[0]).toBe('General outdoor comfort:\n• Temperature data missing – judge by how it feels.');
    expect(sections[2]).toBe('Walking / park:\n• Rating: 🙂 Okay – mixed conditions, choose your time.');
    expect(sections[4]).toBe('Stargazing tonight:\n• Rating: ? – sky condition unknown, check visually tonight.');
  });
});
