// src/services/preferences.ts
// Per-user settings, persisted as one JSON document rewritten on every change

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Config, Unit, resolvePath, ensureDir } from '../config.js';
import { KeyedLock } from '../utils/lock.js';
import { scoped } from '../utils/logger.js';

const log = scoped('preferences');

export interface UserPreferences {
  unit: Unit;
  language: string;
  favorites: string[];
  defaultCity: string | null;
}

export type AddFavoriteResult = 'added' | 'duplicate' | 'full' | 'not_found';

export interface PreferenceDefaults {
  unit: Unit;
  language: string;
  maxFavorites: number;
}

// === On-disk shape ===

// Fields fall back one by one; only a non-object entry is dropped.
const StoredRecordSchema = z.object({
  unit: z.string().optional().catch(undefined),
  language: z.string().optional().catch(undefined),
  favorites: z.array(z.unknown()).optional().catch(undefined),
  default_city: z.string().nullable().optional().catch(null),
});

type StoredRecord = {
  unit: Unit;
  language: string;
  favorites: string[];
  default_city: string | null;
};

const sameCity = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

function dedupeCities(cities: string[]): string[] {
  const result: string[] = [];
  for (const city of cities) {
    if (!result.some(existing => sameCity(existing, city))) {
      result.push(city);
    }
  }
  return result;
}

function isCityName(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function copy(prefs: UserPreferences): UserPreferences {
  return { ...prefs, favorites: [...prefs.favorites] };
}

// === Store ===

export class PreferenceStore {
  private filePath: string;
  private defaults: PreferenceDefaults;
  private records = new Map<number, UserPreferences>();
  private lock = new KeyedLock<number>();

  constructor(filePath: string, defaults: PreferenceDefaults) {
    this.filePath = resolvePath(filePath);
    this.defaults = defaults;
  }

  static fromConfig(config: Config): PreferenceStore {
    return new PreferenceStore(config.preferences.file, {
      unit: config.preferences.defaultUnit,
      language: config.preferences.defaultLanguage,
      maxFavorites: config.preferences.maxFavorites,
    });
  }

  async initialize(): Promise<void> {
    this.load();
    log.info('PreferenceStore initialized', { users: this.records.size, file: this.filePath });
  }

  get size(): number {
    return this.records.size;
  }

  get maxFavorites(): number {
    return this.defaults.maxFavorites;
  }

  // === Reads ===

  /**
   * Returns the user's record, creating and persisting a default one on
   * first sight. The returned object is a copy.
   */
  getOrCreate(userId: number): UserPreferences {
    let prefs = this.records.get(userId);
    if (!prefs) {
      prefs = this.createDefaults();
      this.records.set(userId, prefs);
      log.debug('Created default preferences', { userId });
      this.save();
    }
    return copy(prefs);
  }

  // === Mutations (serialized per user) ===

  /**
   * Runs `fn` against a mutable draft of the user's record while holding the
   * user's lock. The draft is committed when `fn` resolves; the file is only
   * rewritten when the record actually changed. Nothing is committed if `fn`
   * throws.
   */
  async update<T>(userId: number, fn: (draft: UserPreferences) => T | Promise<T>): Promise<T> {
    return this.lock.run(userId, async () => {
      const current = this.getOrCreate(userId);
      const draft = copy(current);
      const result = await fn(draft);

      draft.favorites = dedupeCities(draft.favorites);
      if (JSON.stringify(draft) !== JSON.stringify(current)) {
        this.records.set(userId, copy(draft));
        this.save();
      }
      return result;
    });
  }

  async reset(userId: number): Promise<UserPreferences> {
    return this.lock.run(userId, () => {
      const fresh = this.createDefaults();
      this.records.set(userId, fresh);
      this.save();
      log.info('Preferences reset', { userId });
      return copy(fresh);
    });
  }

  /**
   * Appends `city` unless it is already present (any letter case), the list is
   * at the cap, or `verify` rejects it. The probe runs inside the user's
   * critical section so concurrent adds cannot both pass the checks.
   */
  async addFavorite(
    userId: number,
    city: string,
    verify?: (city: string) => Promise<boolean>
  ): Promise<AddFavoriteResult> {
    const name = city.trim();
    return this.update(userId, async (draft): Promise<AddFavoriteResult> => {
      if (draft.favorites.some(fav => sameCity(fav, name))) return 'duplicate';
      if (draft.favorites.length >= this.defaults.maxFavorites) return 'full';
      if (verify && !(await verify(name))) return 'not_found';

      draft.favorites.push(name);
      return 'added';
    });
  }

  /** Removes the favorite matching `city` in any letter case; returns the stored spelling. */
  async removeFavorite(userId: number, city: string): Promise<string | null> {
    const name = city.trim();
    return this.update(userId, (draft) => {
      const idx = draft.favorites.findIndex(fav => sameCity(fav, name));
      if (idx === -1) return null;
      const [removed] = draft.favorites.splice(idx, 1);
      return removed;
    });
  }

  async toggleUnit(userId: number): Promise<Unit> {
    return this.update(userId, (draft) => {
      draft.unit = draft.unit === 'metric' ? 'imperial' : 'metric';
      return draft.unit;
    });
  }

  async setLanguage(userId: number, language: string): Promise<void> {
    await this.update(userId, (draft) => {
      draft.language = language;
    });
  }

  async setDefaultCity(userId: number, city: string | null): Promise<void> {
    await this.update(userId, (draft) => {
      draft.defaultCity = city ? city.trim() : null;
    });
  }

  // === Persistence ===

  /**
   * Replaces the in-memory table with the file's contents. A missing file is
   * a first run; an unreadable one is logged and leaves the table empty.
   */
  load(): void {
    this.records.clear();
    if (!fs.existsSync(this.filePath)) {
      log.info('No preference file yet, starting empty', { file: this.filePath });
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      log.error('Failed to read preference file', { file: this.filePath, error: String(err) });
      return;
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      log.error('Preference file is not an object', { file: this.filePath });
      return;
    }

    for (const [key, value] of Object.entries(data)) {
      const userId = Number(key);
      const parsed = StoredRecordSchema.safeParse(value);
      if (!Number.isInteger(userId) || !parsed.success) {
        log.warn('Skipping malformed preference record', { key });
        continue;
      }
      this.records.set(userId, this.decode(parsed.data));
    }

    log.info('Loaded preferences', { users: this.records.size });
  }

  /** Rewrites the whole file. Failures are logged; memory stays authoritative. */
  save(): void {
    const document: Record<string, StoredRecord> = {};
    for (const [userId, prefs] of this.records) {
      document[String(userId)] = {
        unit: prefs.unit,
        language: prefs.language,
        favorites: prefs.favorites,
        default_city: prefs.defaultCity,
      };
    }

    try {
      ensureDir(path.dirname(this.filePath));
      fs.writeFileSync(this.filePath, JSON.stringify(document, null, 2));
      log.debug('Saved preferences', { users: this.records.size });
    } catch (err) {
      log.error('Failed to save preferences', { file: this.filePath, error: String(err) });
    }
  }

  close(): void {
    this.save();
  }

  // === Helpers ===

  private createDefaults(): UserPreferences {
    return {
      unit: this.defaults.unit,
      language: this.defaults.language,
      favorites: [],
      defaultCity: null,
    };
  }

  private decode(record: z.infer<typeof StoredRecordSchema>): UserPreferences {
    const unit: Unit = record.unit === 'metric' || record.unit === 'imperial'
      ? record.unit
      : this.defaults.unit;

    return {
      unit,
      language: record.language || this.defaults.language,
      favorites: dedupeCities((record.favorites ?? []).filter(isCityName)).slice(0, this.defaults.maxFavorites),
      defaultCity: record.default_city || null,
    };
  }
}
