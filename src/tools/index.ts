// src/tools/index.ts
import { BotAction, Reply, ToolContext } from './types.js';
import * as system from './system.js';
import * as weatherTools from './weather.js';
import * as favoriteTools from './favorites.js';
import * as settingsTools from './settings.js';

function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(value)}`);
}

export async function executeAction(action: BotAction, context: ToolContext): Promise<Reply[]> {
  switch (action.type) {
    case 'start':
      return system.start(action, context);
    case 'help':
      return system.help(action, context);
    case 'unknownCommand':
      return system.unknownCommand(action, context);
    case 'unknownAction':
      return system.unknownAction(action, context);

    case 'weather':
      return weatherTools.weather(action, context);
    case 'forecast':
      return weatherTools.forecast(action, context);
    case 'alerts':
      return weatherTools.alerts(action, context);
    case 'search':
      return weatherTools.search(action, context);
    case 'map':
      return weatherTools.map(action, context);
    case 'compare':
      return weatherTools.compare(action, context);
    case 'cityMessage':
      return weatherTools.cityMessage(action, context);

    case 'favorites':
      return favoriteTools.favorites(action, context);
    case 'manageFavorites':
      return favoriteTools.manageFavorites(action, context);
    case 'addFavorite':
      return favoriteTools.addFavorite(action, context);
    case 'removeFavorite':
      return favoriteTools.removeFavorite(action, context);

    case 'settings':
      return settingsTools.settings(action, context);
    case 'toggleUnits':
      return settingsTools.toggleUnits(action, context);
    case 'chooseLanguage':
      return settingsTools.chooseLanguage(action, context);
    case 'setLanguage':
      return settingsTools.setLanguage(action, context);
    case 'defaultCityHelp':
      return settingsTools.defaultCityHelp(action, context);
    case 'setDefaultCity':
      return settingsTools.setDefaultCity(action, context);
    case 'clearDefaultCity':
      return settingsTools.clearDefaultCity(action, context);
    case 'resetSettings':
      return settingsTools.resetSettings(action, context);

    default:
      return assertNever(action);
  }
}

// Re-export
export * from './types.js';
