// src/utils/conditions.ts
// Condition codes, wind sectors and alert thresholds for provider data

import type { Unit } from '../config.js';

export type ConditionCategory =
  | 'thunderstorm'
  | 'drizzle'
  | 'rain'
  | 'snow'
  | 'atmosphere'
  | 'clear'
  | 'clouds';

// Checked top to bottom; first match wins.
const CONDITION_TABLE: Array<{ matches: (code: number) => boolean; category: ConditionCategory }> = [
  { matches: (code) => code < 300, category: 'thunderstorm' },
  { matches: (code) => code < 400, category: 'drizzle' },
  { matches: (code) => code < 600, category: 'rain' },
  { matches: (code) => code < 700, category: 'snow' },
  { matches: (code) => code < 800, category: 'atmosphere' },
  { matches: (code) => code === 800, category: 'clear' },
];

const CONDITION_EMOJI: Record<ConditionCategory, string> = {
  thunderstorm: '⛈️',
  drizzle: '🌦️',
  rain: '🌧️',
  snow: '❄️',
  atmosphere: '🌫️',
  clear: '☀️',
  clouds: '☁️',
};

export function conditionCategory(code: number): ConditionCategory {
  return CONDITION_TABLE.find(entry => entry.matches(code))?.category ?? 'clouds';
}

export function conditionEmoji(code: number): string {
  return CONDITION_EMOJI[conditionCategory(code)];
}

// === Wind ===

export const COMPASS_SECTORS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
] as const;

/** Nearest integer, with exact halves going to the even neighbour. */
function roundHalfEven(x: number): number {
  const r = Math.round(x);
  return r - x === 0.5 && r % 2 !== 0 ? r - 1 : r;
}

export function windDirection(degrees: number | null | undefined, placeholder: string): string {
  if (degrees === null || degrees === undefined || !Number.isFinite(degrees)) {
    return placeholder;
  }
  const sector = ((roundHalfEven(degrees / 22.5) % 16) + 16) % 16;
  return COMPASS_SECTORS[sector];
}

// === Alerts ===

export type AlertKind =
  | 'extreme_heat'
  | 'extreme_cold'
  | 'high_wind'
  | 'high_humidity'
  | 'thunderstorm'
  | 'heavy_rain'
  | 'snow';

interface Thresholds {
  heatAbove: number;
  coldBelow: number;
  windAbove: number;
}

const THRESHOLDS: Record<Unit, Thresholds> = {
  metric: { heatAbove: 35, coldBelow: -10, windAbove: 10 },
  imperial: { heatAbove: 95, coldBelow: 14, windAbove: 22 },
};

const HUMIDITY_ALERT_ABOVE = 85;

export interface AlertInput {
  temperature: number;
  humidity: number;
  windSpeed: number;
  conditionCode: number;
}

export function evaluateAlerts(input: AlertInput, unit: Unit): AlertKind[] {
  const limits = THRESHOLDS[unit];
  const alerts: AlertKind[] = [];

  if (input.temperature > limits.heatAbove) {
    alerts.push('extreme_heat');
  } else if (input.temperature < limits.coldBelow) {
    alerts.push('extreme_cold');
  }
  if (input.windSpeed > limits.windAbove) alerts.push('high_wind');
  if (input.humidity > HUMIDITY_ALERT_ABOVE) alerts.push('high_humidity');

  switch (conditionCategory(input.conditionCode)) {
    case 'thunderstorm':
      alerts.push('thunderstorm');
      break;
    case 'rain':
      if (input.conditionCode >= 500) alerts.push('heavy_rain');
      break;
    case 'snow':
      alerts.push('snow');
      break;
    default:
      break;
  }

  return alerts;
}
