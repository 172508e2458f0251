// src/tools/format.ts
// HTML reply bodies built from snapshots

import type { Unit } from '../config.js';
import type { LocalizationService, MessageVars } from '../services/i18n.js';
import type { CityMatch, ForecastSnapshot, WeatherSnapshot } from '../services/weather.js';
import { AlertKind, conditionEmoji, windDirection } from '../utils/conditions.js';

export interface FormatContext {
  i18n: LocalizationService;
  language: string;
  unit: Unit;
  windPlaceholder: string;
}

const ALERT_MESSAGES: Record<AlertKind, string> = {
  extreme_heat: 'extreme_heat_warning',
  extreme_cold: 'extreme_cold_warning',
  high_wind: 'high_wind_alert',
  high_humidity: 'high_humidity_alert',
  thunderstorm: 'thunderstorm_alert',
  heavy_rain: 'heavy_rain_alert',
  snow: 'snow_alert',
};

// === Primitives ===

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function titleCase(text: string): string {
  return text
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function temperatureSymbol(unit: Unit): string {
  return unit === 'metric' ? '°C' : '°F';
}

/** HH:MM at the city's UTC offset. */
export function formatClock(timestamp: number, utcOffsetSeconds: number): string {
  const d = new Date((timestamp + utcOffsetSeconds) * 1000);
  const hh = String(d.getUTCHours()).padStart(2, '0');
  const mm = String(d.getUTCMinutes()).padStart(2, '0');
  return `${hh}:${mm}`;
}

export function cityLabel(match: CityMatch): string {
  return match.state && match.state !== match.name
    ? `${match.name}, ${match.state}, ${match.country}`
    : `${match.name}, ${match.country}`;
}

const translate = (ctx: FormatContext, key: string, vars?: MessageVars) =>
  ctx.i18n.t(ctx.language, key, vars);

// === Current weather ===

export function formatCurrentWeather(w: WeatherSnapshot, ctx: FormatContext): string {
  const tempUnit = temperatureSymbol(ctx.unit);
  const speedUnit = translate(ctx, ctx.unit === 'metric' ? 'meters_per_second' : 'miles_per_hour');
  const wind = windDirection(w.windDegrees, ctx.windPlaceholder);
  const title = translate(ctx, 'weather_in_city', { city: escapeHtml(w.city), country: escapeHtml(w.country) });

  let message =
    `${conditionEmoji(w.conditionCode)} <b>${title}</b>\n\n` +
    `🌡️ ${translate(ctx, 'temperature')}: ${Math.round(w.temperature)}${tempUnit}\n` +
    `🤔 ${translate(ctx, 'feels_like')}: ${Math.round(w.feelsLike)}${tempUnit}\n` +
    `💧 ${translate(ctx, 'humidity')}: ${w.humidity}%\n` +
    `📊 ${translate(ctx, 'pressure')}: ${w.pressure} hPa\n` +
    `💨 ${translate(ctx, 'wind')}: ${w.windSpeed.toFixed(1)} ${speedUnit} ${wind}\n` +
    `☁️ ${translate(ctx, 'cloudiness')}: ${w.cloudCover}%\n`;

  if (w.visibilityKm !== null) {
    message += `👁️ ${translate(ctx, 'visibility')}: ${w.visibilityKm.toFixed(1)} km\n`;
  }

  message +=
    `📝 ${translate(ctx, 'conditions')}: ${escapeHtml(titleCase(w.description))}\n\n` +
    `🌅 ${translate(ctx, 'sunrise')}: ${formatClock(w.sunrise, w.utcOffsetSeconds)}\n` +
    `🌇 ${translate(ctx, 'sunset')}: ${formatClock(w.sunset, w.utcOffsetSeconds)}`;

  return message;
}

// === Forecast ===

const PRECIPITATION_SHOWN_ABOVE = 20;

function weekdayFormatter(language: string): Intl.DateTimeFormat {
  const options: Intl.DateTimeFormatOptions = { weekday: 'long', timeZone: 'UTC' };
  try {
    return new Intl.DateTimeFormat(language, options);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    return new Intl.DateTimeFormat('en', options);
  }
}

export function formatForecast(f: ForecastSnapshot, ctx: FormatContext): string {
  const symbol = temperatureSymbol(ctx.unit);
  const weekday = weekdayFormatter(ctx.language);
  const header = translate(ctx, 'forecast_for_city', { city: escapeHtml(f.city), country: escapeHtml(f.country) });

  const blocks = f.days.map(day => {
    const date = new Date(`${day.date}T00:00:00Z`);
    const [, month, dayOfMonth] = day.date.split('-');
    const pop = Math.round(day.precipitationChance * 100);

    let block = `${conditionEmoji(day.conditionCode)} <b>${weekday.format(date)} (${month}/${dayOfMonth})</b>\n`;
    block += `   🌡️ ${Math.round(day.minTemp)}${symbol} - ${Math.round(day.maxTemp)}${symbol}`;
    if (pop > PRECIPITATION_SHOWN_ABOVE) {
      block += ` | 🌧️ ${pop}%`;
    }
    block += `\n   📝 ${escapeHtml(titleCase(day.description))}`;
    return block;
  });

  return [header, ...blocks].join('\n\n');
}

// === Alerts ===

export function formatAlerts(w: WeatherSnapshot, alerts: AlertKind[], ctx: FormatContext): string {
  const city = escapeHtml(`${w.city}, ${w.country}`);
  if (alerts.length === 0) {
    return translate(ctx, 'no_alerts', { city });
  }

  const alertsList = alerts.map(kind => `• ${translate(ctx, ALERT_MESSAGES[kind])}`).join('\n');
  return translate(ctx, 'alerts_for_city', {
    city,
    alerts_list: alertsList,
    temp: `${Math.round(w.temperature)}${temperatureSymbol(ctx.unit)}`,
  });
}

// === Comparison ===

function rankEmoji(index: number, total: number, first: string, last: string, middle: string): string {
  if (index === 0) return first;
  if (index === total - 1) return last;
  return middle;
}

function pickBy(items: readonly WeatherSnapshot[], better: (a: WeatherSnapshot, b: WeatherSnapshot) => boolean): WeatherSnapshot {
  return items.reduce((best, item) => (better(item, best) ? item : best));
}

export function formatComparison(items: readonly WeatherSnapshot[], ctx: FormatContext): string {
  const symbol = temperatureSymbol(ctx.unit);
  const name = (w: WeatherSnapshot) => escapeHtml(w.city);

  let message = translate(ctx, 'weather_comparison_title');

  const byTemp = [...items].sort((a, b) => b.temperature - a.temperature);
  message += translate(ctx, 'temperature_comparison', { unit_symbol: symbol });
  byTemp.forEach((w, i) => {
    const emoji = rankEmoji(i, byTemp.length, '🔥', '🧊', '🌡️');
    message += `${i + 1}. ${emoji} ${name(w)}: ${w.temperature.toFixed(1)}${symbol}\n`;
  });
  message += '\n';

  const byHumidity = [...items].sort((a, b) => b.humidity - a.humidity);
  message += translate(ctx, 'humidity_comparison');
  byHumidity.forEach((w, i) => {
    const emoji = rankEmoji(i, byHumidity.length, '💧', '🏜️', '💨');
    message += `${i + 1}. ${emoji} ${name(w)}: ${w.humidity}%\n`;
  });
  message += '\n';

  message += translate(ctx, 'current_conditions_comparison');
  for (const w of items) {
    message += `${conditionEmoji(w.conditionCode)} ${name(w)}: ${escapeHtml(titleCase(w.description))}\n`;
  }

  const hottest = pickBy(items, (a, b) => a.temperature > b.temperature);
  const coldest = pickBy(items, (a, b) => a.temperature < b.temperature);
  const mostHumid = pickBy(items, (a, b) => a.humidity > b.humidity);

  message += translate(ctx, 'highlights_comparison');
  message += translate(ctx, 'hottest', { city: name(hottest), temp: hottest.temperature.toFixed(1), unit_symbol: symbol }) + '\n';
  message += translate(ctx, 'coldest', { city: name(coldest), temp: coldest.temperature.toFixed(1), unit_symbol: symbol }) + '\n';
  message += translate(ctx, 'most_humid', { city: name(mostHumid), humidity: mostHumid.humidity });

  return message;
}

// === Search & maps ===

export function formatSearchResults(query: string, matches: CityMatch[], ctx: FormatContext): string {
  const cityList = matches.map((m, i) => `${i + 1}. ${escapeHtml(cityLabel(m))}`).join('\n');
  return translate(ctx, 'cities_matching_search', { query: escapeHtml(query), city_list: cityList });
}

export function mapUrls(lat: number, lon: number): { openWeatherMap: string; googleMaps: string } {
  return {
    openWeatherMap: `https://openweathermap.org/weathermap?basemap=map&cities=true&layer=temperature&lat=${lat}&lon=${lon}&zoom=10`,
    googleMaps: `https://www.google.com/maps/@${lat},${lon},10z`,
  };
}
