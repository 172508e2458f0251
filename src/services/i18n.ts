// src/services/i18n.ts
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { scoped } from '../utils/logger.js';

const log = scoped('i18n');

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_LOCALES_DIR = path.join(__dirname, '..', '..', 'locales');

const LocaleSchema = z.record(z.string());

export type MessageVars = Record<string, string | number>;

/**
 * Message tables keyed by language code, one `<code>.json` file per language.
 * Lookup falls back to the default language, then to the key itself.
 */
export class LocalizationService {
  private dir: string;
  private fallback: string;
  private tables = new Map<string, Record<string, string>>();

  constructor(options: { dir?: string; fallback?: string } = {}) {
    this.dir = options.dir ?? DEFAULT_LOCALES_DIR;
    this.fallback = options.fallback ?? 'en';
  }

  async initialize(): Promise<void> {
    this.load();
    log.info('LocalizationService initialized', { languages: this.languages() });
  }

  load(): void {
    this.tables.clear();
    for (const file of fs.readdirSync(this.dir)) {
      if (!file.endsWith('.json')) continue;
      const code = path.basename(file, '.json');
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(path.join(this.dir, file), 'utf-8'));
      } catch (err) {
        log.warn('Ignoring unreadable locale file', { file, error: String(err) });
        continue;
      }

      const parsed = LocaleSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('Ignoring malformed locale file', { file });
        continue;
      }
      this.tables.set(code, parsed.data);
    }

    if (!this.tables.has(this.fallback)) {
      throw new Error(`Default locale "${this.fallback}" not found in ${this.dir}`);
    }
  }

  languages(): string[] {
    return Array.from(this.tables.keys()).sort();
  }

  has(language: string): boolean {
    return this.tables.has(language);
  }

  t(language: string, key: string, vars: MessageVars = {}): string {
    const template = this.tables.get(language)?.[key]
      ?? this.tables.get(this.fallback)?.[key];

    if (template === undefined) {
      log.warn('Missing message key', { language, key });
      return key;
    }

    return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
      name in vars ? String(vars[name]) : placeholder
    );
  }

  /** Display name of a language, in the given language. */
  languageName(language: string, code: string): string {
    return this.t(language, `language_${code}`);
  }
}
