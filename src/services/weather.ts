// src/services/weather.ts
import { z } from 'zod';
import { Config, Unit } from '../config.js';
import { bucketForecast, ForecastDay, ForecastSample } from '../utils/forecast.js';
import { scoped } from '../utils/logger.js';

const log = scoped('weather');

// === Domain ===

export interface WeatherSnapshot {
  readonly city: string;
  readonly country: string;
  readonly temperature: number;
  readonly feelsLike: number;
  readonly humidity: number;
  readonly pressure: number;
  readonly windSpeed: number;
  readonly windDegrees: number | null;
  readonly cloudCover: number;
  readonly visibilityKm: number | null;
  readonly sunrise: number;
  readonly sunset: number;
  readonly utcOffsetSeconds: number;
  readonly conditionCode: number;
  readonly conditionGroup: string;
  readonly description: string;
}

export interface ForecastSnapshot {
  readonly city: string;
  readonly country: string;
  readonly utcOffsetSeconds: number;
  readonly days: readonly ForecastDay[];
}

export interface CityMatch {
  name: string;
  country: string;
  state: string | null;
  lat: number;
  lon: number;
}

export type TransientReason = 'timeout' | 'network' | 'http' | 'malformed';

export type WeatherFailure =
  | { kind: 'not_found' }
  | { kind: 'transient'; reason: TransientReason; status?: number };

export type TransientFailure = Extract<WeatherFailure, { kind: 'transient' }>;

export type WeatherResult<T> = { kind: 'ok'; value: T } | WeatherFailure;

// === Provider payloads ===

const ConditionSchema = z.object({
  id: z.number(),
  main: z.string().default(''),
  description: z.string().default(''),
});

const CurrentPayloadSchema = z.object({
  name: z.string(),
  timezone: z.number().optional(),
  sys: z.object({
    country: z.string().default(''),
    sunrise: z.number(),
    sunset: z.number(),
  }),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
    pressure: z.number(),
  }),
  weather: z.array(ConditionSchema).min(1),
  wind: z.object({
    speed: z.number().optional(),
    deg: z.number().optional(),
  }).optional(),
  visibility: z.number().optional(),
  clouds: z.object({ all: z.number().optional() }).optional(),
});

const ForecastPayloadSchema = z.object({
  city: z.object({
    name: z.string(),
    country: z.string().default(''),
    timezone: z.number().optional(),
  }),
  list: z.array(z.object({
    dt: z.number(),
    main: z.object({ temp: z.number() }),
    weather: z.array(ConditionSchema).min(1),
    pop: z.number().optional(),
  })),
});

const GeocodePayloadSchema = z.array(z.object({
  name: z.string(),
  country: z.string().default(''),
  state: z.string().optional(),
  lat: z.number(),
  lon: z.number(),
}));

type CurrentPayload = z.infer<typeof CurrentPayloadSchema>;
type ForecastPayload = z.infer<typeof ForecastPayloadSchema>;

// === Mapping ===

export function toWeatherSnapshot(data: CurrentPayload): WeatherSnapshot {
  const condition = data.weather[0];
  return Object.freeze({
    city: data.name,
    country: data.sys.country,
    temperature: data.main.temp,
    feelsLike: data.main.feels_like,
    humidity: data.main.humidity,
    pressure: data.main.pressure,
    windSpeed: data.wind?.speed ?? 0,
    windDegrees: data.wind?.deg ?? null,
    cloudCover: data.clouds?.all ?? 0,
    visibilityKm: data.visibility !== undefined ? data.visibility / 1000 : null,
    sunrise: data.sys.sunrise,
    sunset: data.sys.sunset,
    utcOffsetSeconds: data.timezone ?? 0,
    conditionCode: condition.id,
    conditionGroup: condition.main,
    description: condition.description,
  });
}

export function toForecastSnapshot(data: ForecastPayload): ForecastSnapshot {
  const utcOffsetSeconds = data.city.timezone ?? 0;
  const samples: ForecastSample[] = data.list.map(entry => ({
    timestamp: entry.dt,
    temperature: entry.main.temp,
    conditionCode: entry.weather[0].id,
    conditionGroup: entry.weather[0].main,
    description: entry.weather[0].description,
    precipitationChance: entry.pop ?? 0,
  }));

  return Object.freeze({
    city: data.city.name,
    country: data.city.country,
    utcOffsetSeconds,
    days: Object.freeze(bucketForecast(samples, utcOffsetSeconds)),
  });
}

function isAbort(err: unknown): err is { name: string } {
  return typeof err === 'object' && err !== null && 'name' in err
    && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

// === Gateway ===

/**
 * Outbound calls to the weather provider. Holds no per-request state, so
 * calls may run concurrently.
 */
export class WeatherGateway {
  private apiKey: string;
  private baseUrl: string;
  private timeout: number;
  private probeTimeout: number;

  constructor(options: { apiKey: string; baseUrl: string; timeout: number; probeTimeout: number }) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout;
    this.probeTimeout = options.probeTimeout;
  }

  static fromConfig(config: Config): WeatherGateway {
    return new WeatherGateway(config.weather);
  }

  async initialize(): Promise<void> {
    log.info('WeatherGateway initialized', { baseUrl: this.baseUrl, timeout: this.timeout });
  }

  async currentWeather(city: string, unit: Unit, language: string): Promise<WeatherResult<WeatherSnapshot>> {
    const result = await this.request('/data/2.5/weather', { q: city, units: unit, lang: language }, this.timeout);
    if (result.kind !== 'ok') {
      this.logFailure('Current weather', city, result);
      return result;
    }

    const parsed = CurrentPayloadSchema.safeParse(result.value);
    if (!parsed.success) {
      log.warn('Current weather payload rejected', { city, issues: parsed.error.issues.length });
      return { kind: 'transient', reason: 'malformed' };
    }

    log.debug('Current weather fetched', { city });
    return { kind: 'ok', value: toWeatherSnapshot(parsed.data) };
  }

  async forecast(city: string, unit: Unit, language: string): Promise<WeatherResult<ForecastSnapshot>> {
    const result = await this.request('/data/2.5/forecast', { q: city, units: unit, lang: language }, this.timeout);
    if (result.kind !== 'ok') {
      this.logFailure('Forecast', city, result);
      return result;
    }

    const parsed = ForecastPayloadSchema.safeParse(result.value);
    if (!parsed.success) {
      log.warn('Forecast payload rejected', { city, issues: parsed.error.issues.length });
      return { kind: 'transient', reason: 'malformed' };
    }

    log.debug('Forecast fetched', { city, samples: parsed.data.list.length });
    return { kind: 'ok', value: toForecastSnapshot(parsed.data) };
  }

  /**
   * Candidate cities for a free-text query, in provider order. An empty list
   * is a successful "no matches". The provider has no not-found status here,
   * so a 404 is treated like any other failed call.
   */
  async geocode(query: string, limit: number): Promise<WeatherResult<CityMatch[]>> {
    const result = await this.request('/geo/1.0/direct', { q: query, limit: String(limit) }, this.timeout);
    if (result.kind !== 'ok') {
      this.logFailure('Geocode', query, result);
      return result.kind === 'not_found' ? { kind: 'transient', reason: 'http', status: 404 } : result;
    }

    const parsed = GeocodePayloadSchema.safeParse(result.value);
    if (!parsed.success) {
      log.warn('Geocode payload rejected', { query });
      return { kind: 'transient', reason: 'malformed' };
    }

    const matches = parsed.data.slice(0, limit).map(item => ({
      name: item.name,
      country: item.country,
      state: item.state ?? null,
      lat: item.lat,
      lon: item.lon,
    }));
    log.debug('Geocode results', { query, count: matches.length });
    return { kind: 'ok', value: matches };
  }

  /** True only when the provider answers with a full current-weather payload. */
  async cityExists(city: string, language: string): Promise<boolean> {
    const result = await this.request('/data/2.5/weather', { q: city, units: 'metric', lang: language }, this.probeTimeout);
    if (result.kind !== 'ok') {
      this.logFailure('Existence probe', city, result);
      return false;
    }
    return CurrentPayloadSchema.safeParse(result.value).success;
  }

  close(): void {}

  // === HTTP ===

  private async request(
    endpoint: string,
    params: Record<string, string>,
    timeoutMs: number
  ): Promise<WeatherResult<unknown>> {
    const url = new URL(this.baseUrl + endpoint);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('appid', this.apiKey);

    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      if (response.status === 404) return { kind: 'not_found' };
      if (!response.ok) return { kind: 'transient', reason: 'http', status: response.status };

      try {
        return { kind: 'ok', value: await response.json() };
      } catch (err) {
        if (isAbort(err)) return { kind: 'transient', reason: 'timeout' };
        return { kind: 'transient', reason: 'malformed' };
      }
    } catch (err) {
      if (isAbort(err)) return { kind: 'transient', reason: 'timeout' };
      log.debug('Provider request failed', { endpoint, error: String(err) });
      return { kind: 'transient', reason: 'network' };
    }
  }

  private logFailure(what: string, subject: string, failure: WeatherFailure): void {
    if (failure.kind === 'not_found') {
      log.info(`${what}: not found`, { subject });
    } else {
      log.warn(`${what} failed`, { subject, reason: failure.reason, status: failure.status });
    }
  }
}
