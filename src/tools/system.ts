// src/tools/system.ts
import { escapeHtml } from './format.js';
import { button, reply, t } from './helpers.js';
import { Handler } from './types.js';

const HELP_SECTIONS = [
  { section: 'weather', label: 'current_weather_button' },
  { section: 'forecast', label: 'five_day_forecast_button' },
  { section: 'search', label: 'search_cities_button' },
  { section: 'favorites', label: 'favorites_button' },
  { section: 'settings', label: 'settings_button' },
] as const;

export const start: Handler<'start'> = async (_action, context) => {
  const buttons = HELP_SECTIONS.map(({ section, label }) => [
    button(t(context, label), { type: 'help', section }),
  ]);
  return [reply(t(context, 'welcome'), buttons)];
};

// Every section currently shows the full command list.
export const help: Handler<'help'> = async (_action, context) => {
  return [reply(t(context, 'help'))];
};

export const unknownCommand: Handler<'unknownCommand'> = async (action, context) => {
  return [reply(t(context, 'unknown_command', { command: escapeHtml(action.command) }))];
};

export const unknownAction: Handler<'unknownAction'> = async (_action, context) => {
  return [reply(t(context, 'unknown_action'))];
};
