// src/tools/settings.ts
import { escapeHtml } from './format.js';
import { button, reply, t } from './helpers.js';
import { Handler, Reply, ToolContext } from './types.js';

/** Context re-read from the store after a mutation. */
function refreshed(context: ToolContext): ToolContext {
  return { ...context, prefs: context.services.preferences.getOrCreate(context.userId) };
}

function settingsMenu(context: ToolContext): Reply {
  const { prefs, services } = context;
  const unitName = t(context, prefs.unit === 'metric' ? 'units_celsius' : 'units_fahrenheit');
  const languageName = services.i18n.languageName(prefs.language, prefs.language);
  const defaultCity = prefs.defaultCity ? escapeHtml(prefs.defaultCity) : t(context, 'default_city_not_set');

  const text = t(context, 'settings_menu', {
    unit: unitName,
    language: languageName,
    default_city: defaultCity,
    fav_count: prefs.favorites.length,
  });

  return reply(text, [
    [button(t(context, 'units_toggle_button', { unit_name: unitName }), { type: 'toggleUnits' })],
    [button(t(context, 'language_toggle_button', { language_name: languageName }), { type: 'chooseLanguage' })],
    [button(t(context, 'default_city_button', { city_name: defaultCity }), { type: 'defaultCityHelp' })],
    [button(t(context, 'manage_favorites_button'), { type: 'manageFavorites' })],
    [button(t(context, 'reset_settings_button'), { type: 'resetSettings' })],
  ]);
}

export const settings: Handler<'settings'> = async (_action, context) => {
  return [settingsMenu(context)];
};

export const toggleUnits: Handler<'toggleUnits'> = async (_action, context) => {
  await context.services.preferences.toggleUnit(context.userId);
  return [settingsMenu(refreshed(context))];
};

export const chooseLanguage: Handler<'chooseLanguage'> = async (_action, context) => {
  const { i18n } = context.services;
  const buttons = i18n.languages().map(code => [
    button(i18n.languageName(context.prefs.language, code), { type: 'setLanguage', language: code }),
  ]);
  buttons.push([button(t(context, 'manage_favorites_back'), { type: 'settings' })]);
  return [reply(t(context, 'choose_language'), buttons)];
};

export const setLanguage: Handler<'setLanguage'> = async (action, context) => {
  const { i18n, preferences } = context.services;
  if (!i18n.has(action.language)) {
    return [reply(t(context, 'unknown_action'))];
  }

  await preferences.setLanguage(context.userId, action.language);
  const next = refreshed(context);
  const confirmation = t(next, 'language_set', {
    language_name: i18n.languageName(action.language, action.language),
  });
  return [reply(confirmation), settingsMenu(next)];
};

export const defaultCityHelp: Handler<'defaultCityHelp'> = async (_action, context) => {
  return [reply(t(context, 'set_default_city_instructions'))];
};

export const setDefaultCity: Handler<'setDefaultCity'> = async (action, context) => {
  const city = action.city;
  if (!city) return [reply(t(context, 'specify_city_default'))];

  const { preferences, weather } = context.services;
  if (!(await weather.cityExists(city, context.prefs.language))) {
    return [reply(t(context, 'city_not_found', { city: escapeHtml(city) }))];
  }

  await preferences.setDefaultCity(context.userId, city);
  return [reply(t(context, 'default_city_set', { city: escapeHtml(city.trim()) }))];
};

export const clearDefaultCity: Handler<'clearDefaultCity'> = async (_action, context) => {
  await context.services.preferences.setDefaultCity(context.userId, null);
  return [reply(t(context, 'default_city_cleared'))];
};

export const resetSettings: Handler<'resetSettings'> = async (_action, context) => {
  await context.services.preferences.reset(context.userId);
  return [reply(t(refreshed(context), 'reset_settings_confirm'))];
};
