// src/tools/favorites.ts
import { escapeHtml } from './format.js';
import { button, reply, t } from './helpers.js';
import { Handler, Reply, ToolContext } from './types.js';

function manageFavoritesReply(context: ToolContext, favorites: string[]): Reply {
  const buttons = favorites.map(city => [
    button(t(context, 'remove_favorite_button', { city }), { type: 'removeFavorite', city }),
  ]);
  buttons.push([button(t(context, 'manage_favorites_back'), { type: 'settings' })]);

  const text = favorites.length > 0 ? t(context, 'manage_favorites_menu') : t(context, 'no_favorites');
  return reply(text, buttons);
}

export const favorites: Handler<'favorites'> = async (_action, context) => {
  const list = context.prefs.favorites;
  if (list.length === 0) return [reply(t(context, 'no_favorites'))];

  const buttons = list.map(city => [button(`🌤️ ${city}`, { type: 'weather', city })]);
  buttons.push([button(t(context, 'manage_favorites_button'), { type: 'manageFavorites' })]);
  return [reply(t(context, 'favorites_list', { count: list.length }), buttons)];
};

export const manageFavorites: Handler<'manageFavorites'> = async (_action, context) => {
  return [manageFavoritesReply(context, context.prefs.favorites)];
};

/**
 * Typed names are checked with the provider before they are stored; a
 * button only ever carries a name the bot already looked up.
 */
export const addFavorite: Handler<'addFavorite'> = async (action, context) => {
  const city = action.city;
  if (!city) return [reply(t(context, 'specify_city_addfav'))];

  const { preferences, weather } = context.services;
  const verify = action.source === 'command'
    ? (name: string) => weather.cityExists(name, context.prefs.language)
    : undefined;

  const result = await preferences.addFavorite(context.userId, city, verify);
  const safe = escapeHtml(city.trim());

  switch (result) {
    case 'added':
      return [reply(t(context, 'added_favorite', { city: safe }))];
    case 'duplicate':
      return [reply(t(context, 'already_favorite', { city: safe }))];
    case 'full':
      return [reply(t(context, 'favorites_full', { max: preferences.maxFavorites }))];
    case 'not_found':
      return [reply(t(context, 'city_not_found', { city: safe }))];
  }
};

export const removeFavorite: Handler<'removeFavorite'> = async (action, context) => {
  const city = action.city;
  if (!city) return [reply(t(context, 'specify_city_removefav'))];

  const { preferences } = context.services;
  const removed = await preferences.removeFavorite(context.userId, city);
  const text = removed === null
    ? t(context, 'not_in_favorites', { city: escapeHtml(city) })
    : t(context, 'removed_favorite', { city: escapeHtml(removed) });

  if (action.source === 'button') {
    const remaining = preferences.getOrCreate(context.userId).favorites;
    return [reply(text), manageFavoritesReply(context, remaining)];
  }
  return [reply(text)];
};
