// src/tools/helpers.ts
// Reply building blocks shared by the handlers

import type { MessageVars } from '../services/i18n.js';
import type { WeatherFailure } from '../services/weather.js';
import { encodeCallback } from '../router/parse.js';
import { escapeHtml, FormatContext } from './format.js';
import { Button, ButtonAction, Reply, ToolContext } from './types.js';

export function reply(text: string, buttons: Button[][] = []): Reply {
  return { text, buttons, edit: false };
}

export function button(label: string, action: ButtonAction): Button {
  return { label, callback: encodeCallback(action) };
}

export function linkButton(label: string, url: string): Button {
  return { label, url };
}

export function t(context: ToolContext, key: string, vars?: MessageVars): string {
  return context.services.i18n.t(context.prefs.language, key, vars);
}

export function formatContext(context: ToolContext): FormatContext {
  return {
    i18n: context.services.i18n,
    language: context.prefs.language,
    unit: context.prefs.unit,
    windPlaceholder: context.services.config.bot.windPlaceholder,
  };
}

/** The city named in the request, else the user's default city. */
export function resolveCity(city: string | null, context: ToolContext): string | null {
  return city ?? context.prefs.defaultCity;
}

/**
 * Not-found names the city; a transient failure gets the command's own
 * "could not fetch" text.
 */
export function failureReply(
  failure: WeatherFailure,
  city: string,
  transientKey: string,
  context: ToolContext
): Reply {
  if (failure.kind === 'not_found') {
    return reply(t(context, 'city_not_found', { city: escapeHtml(city) }));
  }
  return reply(t(context, transientKey));
}
