// src/router/parse.ts
// Boundary parsing: inbound text and button data -> BotAction, and back for buttons

import { BotAction, ButtonAction } from '../tools/types.js';

type CommandParser = (args: string | null) => BotAction;

const COMMANDS: Record<string, CommandParser> = {
  start: () => ({ type: 'start' }),
  help: () => ({ type: 'help', section: null }),
  weather: (city) => ({ type: 'weather', city }),
  forecast: (city) => ({ type: 'forecast', city }),
  search: (query) => ({ type: 'search', query }),
  favorites: () => ({ type: 'favorites' }),
  addfav: (city) => ({ type: 'addFavorite', city, source: 'command' }),
  removefav: (city) => ({ type: 'removeFavorite', city, source: 'command' }),
  settings: () => ({ type: 'settings' }),
  alerts: (city) => ({ type: 'alerts', city }),
  compare: (args) => ({ type: 'compare', cities: splitCities(args) }),
  map: (city) => ({ type: 'map', city }),
  setdefault: (city) => ({ type: 'setDefaultCity', city }),
  cleardefault: () => ({ type: 'clearDefaultCity' }),
};

export const COMMAND_NAMES = Object.keys(COMMANDS);

function splitCities(args: string | null): string[] {
  if (!args) return [];
  return args
    .split(',')
    .map(city => city.trim())
    .filter(city => city.length > 0);
}

function stripQuotes(text: string): string {
  return text.replace(/^["']+|["']+$/g, '').trim();
}

/**
 * `/command args` becomes the matching action (a `@botname` suffix on the
 * command is ignored); any other non-empty text is taken as a city name.
 */
export function parseMessage(text: string): BotAction | null {
  const input = text.trim();
  if (!input) return null;

  if (input.startsWith('/')) {
    const match = input.match(/^\/([^\s@]+)(?:@\S+)?(?:\s+([\s\S]*))?$/);
    const command = (match?.[1] ?? '').toLowerCase();
    const args = match?.[2]?.trim() || null;

    const parser = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
    if (!parser) return { type: 'unknownCommand', command: `/${command}` };
    return parser(args);
  }

  const city = stripQuotes(input);
  return city ? { type: 'cityMessage', city } : null;
}

// === Button data ===

const CALLBACK_PREFIXES = {
  weather: 'weather:',
  addFavorite: 'addfav:',
  removeFavorite: 'removefav:',
  setLanguage: 'set_lang:',
  help: 'help:',
} as const;

const CALLBACK_FLAGS = {
  manageFavorites: 'manage_favorites',
  settings: 'back_to_settings',
  toggleUnits: 'toggle_units',
  chooseLanguage: 'choose_language',
  defaultCityHelp: 'set_default_city',
  resetSettings: 'reset_settings',
} as const;

const FLAG_ACTIONS = new Map<string, BotAction>([
  [CALLBACK_FLAGS.manageFavorites, { type: 'manageFavorites' }],
  [CALLBACK_FLAGS.settings, { type: 'settings' }],
  [CALLBACK_FLAGS.toggleUnits, { type: 'toggleUnits' }],
  [CALLBACK_FLAGS.chooseLanguage, { type: 'chooseLanguage' }],
  [CALLBACK_FLAGS.defaultCityHelp, { type: 'defaultCityHelp' }],
  [CALLBACK_FLAGS.resetSettings, { type: 'resetSettings' }],
]);

export function encodeCallback(action: ButtonAction): string {
  switch (action.type) {
    case 'weather':
      return CALLBACK_PREFIXES.weather + action.city;
    case 'addFavorite':
      return CALLBACK_PREFIXES.addFavorite + action.city;
    case 'removeFavorite':
      return CALLBACK_PREFIXES.removeFavorite + action.city;
    case 'setLanguage':
      return CALLBACK_PREFIXES.setLanguage + action.language;
    case 'help':
      return CALLBACK_PREFIXES.help + action.section;
    default:
      return CALLBACK_FLAGS[action.type];
  }
}

export function parseCallback(data: string): BotAction {
  const sep = data.indexOf(':');
  if (sep !== -1) {
    const prefix = data.slice(0, sep + 1);
    const value = data.slice(sep + 1).trim();

    if (value) {
      switch (prefix) {
        case CALLBACK_PREFIXES.weather:
          return { type: 'weather', city: value };
        case CALLBACK_PREFIXES.addFavorite:
          return { type: 'addFavorite', city: value, source: 'button' };
        case CALLBACK_PREFIXES.removeFavorite:
          return { type: 'removeFavorite', city: value, source: 'button' };
        case CALLBACK_PREFIXES.setLanguage:
          return { type: 'setLanguage', language: value };
        case CALLBACK_PREFIXES.help:
          return { type: 'help', section: value };
      }
    }
  }

  return FLAG_ACTIONS.get(data) ?? { type: 'unknownAction', data };
}
