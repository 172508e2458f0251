// src/services/index.ts
import { Config } from '../config.js';
import { LocalizationService } from './i18n.js';
import { PreferenceStore } from './preferences.js';
import { WeatherGateway } from './weather.js';
import { info } from '../utils/logger.js';

export interface ServiceContainer {
  // Config (source of truth)
  config: Config;

  // Per-user state
  preferences: PreferenceStore;

  // Provider access
  weather: WeatherGateway;

  // Message tables
  i18n: LocalizationService;
}

export async function initServices(config: Config): Promise<ServiceContainer> {
  info('Initializing services...');

  const i18n = new LocalizationService();
  const preferences = PreferenceStore.fromConfig(config);
  const weather = WeatherGateway.fromConfig(config);

  await i18n.initialize();
  await preferences.initialize();
  await weather.initialize();

  info('All services initialized');

  return {
    config,
    preferences,
    weather,
    i18n,
  };
}

export function closeServices(services: ServiceContainer): void {
  info('Closing services...');
  services.weather.close();
  services.preferences.close();
}

export { LocalizationService } from './i18n.js';
export { PreferenceStore } from './preferences.js';
export { WeatherGateway } from './weather.js';
