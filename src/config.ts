// src/config.ts
import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

dotenv.config();

// === Schema ===

const UnitSchema = z.enum(['metric', 'imperial']);

function isLocaleTag(code: string): boolean {
  try {
    Intl.getCanonicalLocales(code);
    return true;
  } catch {
    return false;
  }
}

const ConfigSchema = z.object({
  bot: z.object({
    token: z.string().optional(),
    maxCompareCities: z.number().int().min(2),
    searchLimit: z.number().int().positive(),
    searchDisplayLimit: z.number().int().positive(),
    windPlaceholder: z.string().min(1),
  }),

  weather: z.object({
    apiKey: z.string().min(1, 'WEATHER_API_KEY is required'),
    baseUrl: z.string().url(),
    timeout: z.number().positive(),
    probeTimeout: z.number().positive(),
  }),

  preferences: z.object({
    file: z.string(),
    defaultUnit: UnitSchema,
    defaultLanguage: z.string().min(2).refine(isLocaleTag, 'DEFAULT_LANGUAGE must be a language tag such as "en"'),
    maxFavorites: z.number().int().positive(),
  }),

  server: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(0).max(65535),
    host: z.string(),
  }),

  repl: z.object({
    enabled: z.boolean(),
    userId: z.number().int(),
  }),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    file: z.string(),
    console: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Unit = z.infer<typeof UnitSchema>;

// === Loader ===

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const config = ConfigSchema.parse({
    bot: {
      token: env.BOT_TOKEN || undefined,
      maxCompareCities: parseInt(env.MAX_COMPARE_CITIES || '4'),
      searchLimit: parseInt(env.SEARCH_LIMIT || '10'),
      searchDisplayLimit: parseInt(env.SEARCH_DISPLAY_LIMIT || '8'),
      windPlaceholder: env.WIND_PLACEHOLDER || 'N/A',
    },
    weather: {
      apiKey: env.WEATHER_API_KEY || '',
      baseUrl: env.WEATHER_API_URL || 'https://api.openweathermap.org',
      timeout: parseInt(env.REQUEST_TIMEOUT || '10000'),
      probeTimeout: parseInt(env.PROBE_TIMEOUT || '5000'),
    },
    preferences: {
      file: env.PREFERENCES_FILE || './data/user_preferences.json',
      defaultUnit: env.DEFAULT_UNIT || 'metric',
      defaultLanguage: env.DEFAULT_LANGUAGE || 'en',
      maxFavorites: parseInt(env.MAX_FAVORITES || '10'),
    },
    server: {
      enabled: env.SERVER_ENABLED === 'true',
      port: parseInt(env.SERVER_PORT || '3000'),
      host: env.SERVER_HOST || '0.0.0.0',
    },
    repl: {
      enabled: env.REPL_ENABLED !== 'false',
      userId: parseInt(env.REPL_USER_ID || '1'),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      file: env.LOG_FILE || './logs/bot.log',
      console: env.LOG_CONSOLE !== 'false',
    },
  });

  return config;
}

// === Path Helpers ===

export function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.join(process.cwd(), p);
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}
