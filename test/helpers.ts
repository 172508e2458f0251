// Shared fixtures for handler, router and server tests
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../src/config.js';
import { LocalizationService } from '../src/services/i18n.js';
import { ServiceContainer } from '../src/services/index.js';
import { PreferenceStore } from '../src/services/preferences.js';
import { CityMatch, WeatherGateway, WeatherSnapshot } from '../src/services/weather.js';

export function makeSnapshot(overrides: Partial<WeatherSnapshot> = {}): WeatherSnapshot {
  return {
    city: 'London',
    country: 'GB',
    temperature: 12.6,
    feelsLike: 11.2,
    humidity: 81,
    pressure: 1012,
    windSpeed: 4.6,
    windDegrees: 240,
    cloudCover: 75,
    visibilityKm: 9,
    sunrise: 1772430000,
    sunset: 1772470000,
    utcOffsetSeconds: 3600,
    conditionCode: 500,
    conditionGroup: 'Rain',
    description: 'light rain',
    ...overrides,
  };
}

export function makeMatch(overrides: Partial<CityMatch> = {}): CityMatch {
  return { name: 'London', country: 'GB', state: 'England', lat: 51.5073, lon: -0.1277, ...overrides };
}

export interface TestServices {
  services: ServiceContainer;
  dir: string;
  cleanup: () => void;
}

/**
 * Real preference store in a temp dir, shipped locales, and a gateway whose
 * methods tests replace with `vi.spyOn`. Nothing reaches the network.
 */
export function makeServices(env: Record<string, string> = {}): TestServices {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skybot-'));
  const config = loadConfig({
    WEATHER_API_KEY: 'test-key',
    WEATHER_API_URL: 'https://weather.test',
    PREFERENCES_FILE: path.join(dir, 'user_preferences.json'),
    MAX_FAVORITES: '3',
    MAX_COMPARE_CITIES: '3',
    ...env,
  });

  const i18n = new LocalizationService();
  i18n.load();

  const services: ServiceContainer = {
    config,
    preferences: PreferenceStore.fromConfig(config),
    weather: WeatherGateway.fromConfig(config),
    i18n,
  };

  return {
    services,
    dir,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
