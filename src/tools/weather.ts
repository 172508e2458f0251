// src/tools/weather.ts
import type { WeatherSnapshot } from '../services/weather.js';
import { evaluateAlerts } from '../utils/conditions.js';
import { scoped } from '../utils/logger.js';
import {
  cityLabel,
  escapeHtml,
  formatAlerts,
  formatComparison,
  formatCurrentWeather,
  formatForecast,
  formatSearchResults,
  mapUrls,
} from './format.js';
import { button, failureReply, formatContext, linkButton, reply, resolveCity, t } from './helpers.js';
import { Button, Handler, Reply, ToolContext } from './types.js';

const log = scoped('tools:weather');

async function currentWeatherReply(city: string, context: ToolContext, suggestion: Button[][] = []): Promise<Reply> {
  const { unit, language } = context.prefs;
  const result = await context.services.weather.currentWeather(city, unit, language);
  if (result.kind !== 'ok') {
    return failureReply(result, city, 'api_request_failed', context);
  }
  return reply(formatCurrentWeather(result.value, formatContext(context)), suggestion);
}

export const weather: Handler<'weather'> = async (action, context) => {
  const city = resolveCity(action.city, context);
  if (!city) return [reply(t(context, 'specify_city_weather'))];
  return [await currentWeatherReply(city, context)];
};

export const forecast: Handler<'forecast'> = async (action, context) => {
  const city = resolveCity(action.city, context);
  if (!city) return [reply(t(context, 'specify_city_forecast'))];

  const { unit, language } = context.prefs;
  const result = await context.services.weather.forecast(city, unit, language);
  if (result.kind !== 'ok') {
    return [failureReply(result, city, 'error_fetching_forecast', context)];
  }
  return [reply(formatForecast(result.value, formatContext(context)))];
};

export const alerts: Handler<'alerts'> = async (action, context) => {
  const city = resolveCity(action.city, context);
  if (!city) return [reply(t(context, 'specify_city_alerts'))];

  const { unit, language } = context.prefs;
  const result = await context.services.weather.currentWeather(city, unit, language);
  if (result.kind !== 'ok') {
    return [failureReply(result, city, 'error_fetching_alerts', context)];
  }

  const w = result.value;
  const found = evaluateAlerts(
    { temperature: w.temperature, humidity: w.humidity, windSpeed: w.windSpeed, conditionCode: w.conditionCode },
    unit
  );
  log.debug('Alerts evaluated', { city, count: found.length });
  return [reply(formatAlerts(w, found, formatContext(context)))];
};

export const search: Handler<'search'> = async (action, context) => {
  const query = action.query;
  if (!query) return [reply(t(context, 'specify_query_search'))];

  const { searchLimit, searchDisplayLimit } = context.services.config.bot;
  const result = await context.services.weather.geocode(query, searchLimit);
  if (result.kind !== 'ok') {
    return [reply(t(context, 'error_searching_cities'))];
  }
  if (result.value.length === 0) {
    return [reply(t(context, 'no_cities_found_search', { query: escapeHtml(query) }))];
  }

  const shown = result.value.slice(0, searchDisplayLimit);
  const buttons = shown.map(match => [
    button(`🌤️ ${cityLabel(match)}`, { type: 'weather', city: match.name }),
  ]);
  return [reply(formatSearchResults(query, shown, formatContext(context)), buttons)];
};

export const map: Handler<'map'> = async (action, context) => {
  const city = action.city;
  if (!city) return [reply(t(context, 'specify_city_map'))];

  const result = await context.services.weather.geocode(city, 1);
  if (result.kind !== 'ok') {
    return [reply(t(context, 'error_generating_map'))];
  }

  const [match] = result.value;
  if (!match) {
    return [reply(t(context, 'city_not_found', { city: escapeHtml(city) }))];
  }

  const urls = mapUrls(match.lat, match.lon);
  return [
    reply(t(context, 'map_links', { city: escapeHtml(`${match.name}, ${match.country}`) }), [
      [linkButton(t(context, 'openweather_map_button'), urls.openWeatherMap)],
      [linkButton(t(context, 'google_maps_button'), urls.googleMaps)],
    ]),
  ];
};

/**
 * Ranks 2..maxCompareCities cities. Extra cities are dropped with a notice;
 * the first city (in the order given) that fails decides the error reply.
 */
export const compare: Handler<'compare'> = async (action, context) => {
  if (action.cities.length === 0) return [reply(t(context, 'specify_cities_compare'))];
  if (action.cities.length < 2) return [reply(t(context, 'not_enough_cities'))];

  const replies: Reply[] = [];
  const max = context.services.config.bot.maxCompareCities;
  let cities = action.cities;
  if (cities.length > max) {
    replies.push(reply(t(context, 'too_many_cities', { max })));
    cities = cities.slice(0, max);
  }

  const { unit, language } = context.prefs;
  const results = await Promise.all(
    cities.map(city => context.services.weather.currentWeather(city, unit, language))
  );

  const snapshots: WeatherSnapshot[] = [];
  for (const [i, result] of results.entries()) {
    if (result.kind !== 'ok') {
      replies.push(failureReply(result, cities[i], 'error_fetching_comparison', context));
      return replies;
    }
    snapshots.push(result.value);
  }

  replies.push(reply(formatComparison(snapshots, formatContext(context))));
  return replies;
};

/**
 * Bare text is a city name. When the city could still join the favorites,
 * the reply offers a button for it.
 */
export const cityMessage: Handler<'cityMessage'> = async (action, context) => {
  const { city } = action;
  const { favorites, language } = context.prefs;
  const known = favorites.some(fav => fav.toLowerCase() === city.toLowerCase());
  const hasRoom = favorites.length < context.services.preferences.maxFavorites;

  let suggestion: Button[][] = [];
  if (!known && hasRoom && (await context.services.weather.cityExists(city, language))) {
    suggestion = [[button(t(context, 'add_to_favorites_button'), { type: 'addFavorite', city })]];
  }

  return [await currentWeatherReply(city, context, suggestion)];
};
