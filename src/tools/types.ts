// src/tools/types.ts
import { ServiceContainer } from '../services/index.js';
import { UserPreferences } from '../services/preferences.js';

/** Where an action came from: a typed message or a pressed button. */
export type ActionSource = 'command' | 'button';

/**
 * Every request the bot understands. Produced once at the boundary by
 * `parseMessage` / `parseCallback`; handled by an exhaustive switch.
 */
export type BotAction =
  | { type: 'start' }
  | { type: 'help'; section: string | null }
  | { type: 'weather'; city: string | null }
  | { type: 'forecast'; city: string | null }
  | { type: 'search'; query: string | null }
  | { type: 'favorites' }
  | { type: 'addFavorite'; city: string | null; source: ActionSource }
  | { type: 'removeFavorite'; city: string | null; source: ActionSource }
  | { type: 'manageFavorites' }
  | { type: 'settings' }
  | { type: 'toggleUnits' }
  | { type: 'chooseLanguage' }
  | { type: 'setLanguage'; language: string }
  | { type: 'defaultCityHelp' }
  | { type: 'setDefaultCity'; city: string | null }
  | { type: 'clearDefaultCity' }
  | { type: 'resetSettings' }
  | { type: 'alerts'; city: string | null }
  | { type: 'compare'; cities: string[] }
  | { type: 'map'; city: string | null }
  | { type: 'cityMessage'; city: string }
  | { type: 'unknownCommand'; command: string }
  | { type: 'unknownAction'; data: string };

export type BotActionType = BotAction['type'];

/** Actions that can be attached to a button. */
export type ButtonAction =
  | { type: 'help'; section: string }
  | { type: 'weather'; city: string }
  | { type: 'addFavorite'; city: string }
  | { type: 'removeFavorite'; city: string }
  | { type: 'manageFavorites' }
  | { type: 'settings' }
  | { type: 'toggleUnits' }
  | { type: 'chooseLanguage' }
  | { type: 'setLanguage'; language: string }
  | { type: 'defaultCityHelp' }
  | { type: 'resetSettings' };

export type Button =
  | { label: string; callback: string }
  | { label: string; url: string };

export interface Reply {
  /** HTML-formatted body. */
  text: string;
  /** Rows of buttons. */
  buttons: Button[][];
  /** Replace the message the pressed button belongs to instead of sending a new one. */
  edit: boolean;
}

export interface ToolContext {
  userId: number;
  prefs: UserPreferences;
  services: ServiceContainer;
}

export type ActionOf<T extends BotActionType> = Extract<BotAction, { type: T }>;

export type Handler<T extends BotActionType> = (action: ActionOf<T>, context: ToolContext) => Promise<Reply[]>;
