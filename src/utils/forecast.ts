// src/utils/forecast.ts
// Reduces 3-hour forecast samples to one summary per local calendar day

export interface ForecastSample {
  /** Unix seconds. */
  timestamp: number;
  temperature: number;
  conditionCode: number;
  /** Provider condition group, e.g. "Rain" or "Clear". */
  conditionGroup: string;
  description: string;
  /** Probability of precipitation, 0..1. */
  precipitationChance: number;
}

export interface ForecastDay {
  /** Local calendar date, YYYY-MM-DD. */
  date: string;
  minTemp: number;
  maxTemp: number;
  dominantCondition: string;
  conditionCode: number;
  description: string;
  precipitationChance: number;
}

export const MAX_FORECAST_DAYS = 5;

/** Calendar date of a unix timestamp at the given UTC offset. */
export function localDateKey(timestamp: number, utcOffsetSeconds: number): string {
  return new Date((timestamp + utcOffsetSeconds) * 1000).toISOString().slice(0, 10);
}

/**
 * The most frequent condition group. Ties go to the group seen first when
 * scanning the samples in order.
 */
export function dominantCondition(samples: ForecastSample[]): string {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    counts.set(sample.conditionGroup, (counts.get(sample.conditionGroup) ?? 0) + 1);
  }

  let best = '';
  let bestCount = 0;
  for (const [group, count] of counts) {
    if (count > bestCount) {
      best = group;
      bestCount = count;
    }
  }
  return best;
}

export function bucketForecast(
  samples: ForecastSample[],
  utcOffsetSeconds: number,
  maxDays: number = MAX_FORECAST_DAYS
): ForecastDay[] {
  const byDay = new Map<string, ForecastSample[]>();
  for (const sample of samples) {
    const key = localDateKey(sample.timestamp, utcOffsetSeconds);
    const bucket = byDay.get(key);
    if (bucket) {
      bucket.push(sample);
    } else {
      byDay.set(key, [sample]);
    }
  }

  const days: ForecastDay[] = [];
  for (const date of Array.from(byDay.keys()).sort().slice(0, maxDays)) {
    const daySamples = byDay.get(date) ?? [];
    if (daySamples.length === 0) continue;

    const dominant = dominantCondition(daySamples);
    const representative = daySamples.find(s => s.conditionGroup === dominant) ?? daySamples[0];
    const temps = daySamples.map(s => s.temperature);

    days.push({
      date,
      minTemp: Math.min(...temps),
      maxTemp: Math.max(...temps),
      dominantCondition: dominant,
      conditionCode: representative.conditionCode,
      description: representative.description,
      precipitationChance: Math.max(...daySamples.map(s => s.precipitationChance)),
    });
  }

  return days;
}
