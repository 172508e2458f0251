import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { LocalizationService } from './i18n.js';

describe('LocalizationService', () => {
  const dirs: string[] = [];

  const makeLocales = (files: Record<string, unknown>): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'locales-'));
    dirs.push(dir);
    for (const [name, content] of Object.entries(files)) {
      fs.writeFileSync(path.join(dir, name), JSON.stringify(content));
    }
    return dir;
  };

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('substitutes placeholders and leaves unknown ones alone', () => {
    const i18n = new LocalizationService({
      dir: makeLocales({ 'en.json': { greet: 'Hi {name}, {missing}' } }),
    });
    i18n.load();

    expect(i18n.t('en', 'greet', { name: 'Ada' })).toBe('Hi Ada, {missing}');
  });

  it('falls back to the default language, then to the key', () => {
    const i18n = new LocalizationService({
      dir: makeLocales({
        'en.json': { only_en: 'English text', shared: 'shared en' },
        'fr.json': { shared: 'partagé' },
      }),
    });
    i18n.load();

    expect(i18n.t('fr', 'shared')).toBe('partagé');
    expect(i18n.t('fr', 'only_en')).toBe('English text');
    expect(i18n.t('de', 'shared')).toBe('shared en');
    expect(i18n.t('fr', 'nope')).toBe('nope');
  });

  it('skips malformed tables and requires the default one', () => {
    const dir = makeLocales({ 'en.json': { a: 'b' }, 'xx.json': { a: 1 }, 'notes.txt': 'ignored' });
    const i18n = new LocalizationService({ dir });
    i18n.load();
    expect(i18n.languages()).toEqual(['en']);

    const noDefault = new LocalizationService({ dir: makeLocales({ 'fr.json': {} }) });
    expect(() => noDefault.load()).toThrow('Default locale "en" not found');
  });

  it('ships English and Arabic tables with the same keys', () => {
    const i18n = new LocalizationService();
    i18n.load();

    expect(i18n.languages()).toEqual(['ar', 'en']);
    expect(i18n.languageName('en', 'ar')).toBe('Arabic');
    expect(i18n.languageName('ar', 'ar')).toBe('العربية');
  });
});
