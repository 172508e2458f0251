import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeMatch, makeServices, makeSnapshot, TestServices } from '../../test/helpers.js';
import { CommandRouter } from './index.js';

const USER = 7;

describe('CommandRouter', () => {
  let env: TestServices;
  let router: CommandRouter;

  const setup = (overrides: Record<string, string> = {}) => {
    env?.cleanup();
    env = makeServices(overrides);
    router = new CommandRouter(env.services);
  };

  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('network disabled in tests')));
    setup();
  });

  afterEach(() => {
    env.cleanup();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  const prefs = () => env.services.preferences.getOrCreate(USER);
  const send = (text: string) => router.handleMessage(USER, text);
  const press = (data: string) => router.handleCallback(USER, data);

  describe('basics', () => {
    it('greets with one help button per section', async () => {
      const [reply] = await send('/start');

      expect(reply.text.startsWith('👋 <b>Welcome to the Weather Bot!</b>')).toBe(true);
      expect(reply.buttons.map(row => row.map(b => ('callback' in b ? b.callback : b.url)))).toEqual([
        ['help:weather'],
        ['help:forecast'],
        ['help:search'],
        ['help:favorites'],
        ['help:settings'],
      ]);
    });

    it('answers help buttons in place', async () => {
      const replies = await press('help:forecast');

      expect(replies).toHaveLength(1);
      expect(replies[0].edit).toBe(true);
      expect(replies[0].text.startsWith('<b>Commands</b>')).toBe(true);
    });

    it('persists a record for a first-time user', async () => {
      await send('/help');
      expect(env.services.preferences.size).toBe(1);
      expect(prefs()).toEqual({ unit: 'metric', language: 'en', favorites: [], defaultCity: null });
    });

    it('ignores blank messages', async () => {
      expect(await send('   ')).toEqual([]);
    });

    it('reports unknown commands and stale buttons', async () => {
      expect((await send('/teleport'))[0].text).toBe('🤷 Unknown command: /teleport. Try /help.');
      expect(await press('explode')).toEqual([
        { text: '🤷 That button is no longer available.', buttons: [], edit: true },
      ]);
    });

    it('turns a handler failure into a generic error reply', async () => {
      vi.spyOn(env.services.weather, 'currentWeather').mockRejectedValue(new Error('boom'));

      expect(await send('/weather London')).toEqual([
        { text: '❌ An unexpected error occurred. Please try again.', buttons: [], edit: false },
      ]);
    });
  });

  describe('weather and forecast', () => {
    it('fetches current weather in the user units and language', async () => {
      const current = vi.spyOn(env.services.weather, 'currentWeather')
        .mockResolvedValue({ kind: 'ok', value: makeSnapshot() });

      const [reply] = await send('/weather London');

      expect(current).toHaveBeenCalledWith('London', 'metric', 'en');
      expect(reply.text.split('\n')[0]).toBe('🌧️ <b>Weather in London, GB</b>');
      expect(reply.buttons).toEqual([]);
      expect(reply.edit).toBe(false);
    });

    it('falls back to the default city, then to usage help', async () => {
      const current = vi.spyOn(env.services.weather, 'currentWeather')
        .mockResolvedValue({ kind: 'ok', value: makeSnapshot({ city: 'Paris', country: 'FR' }) });

      expect((await send('/weather'))[0].text).toBe(
        'Please specify a city. Usage: /weather &lt;city&gt;\nTip: set a default city with /setdefault.'
      );
      expect(current).not.toHaveBeenCalled();

      await env.services.preferences.setDefaultCity(USER, 'Paris');
      await send('/weather');
      expect(current).toHaveBeenCalledWith('Paris', 'metric', 'en');
    });

    it('tells not-found apart from a failed request', async () => {
      const current = vi.spyOn(env.services.weather, 'currentWeather');

      current.mockResolvedValueOnce({ kind: 'not_found' });
      expect((await send('/weather Atlantis'))[0].text).toBe(
        '🚫 City "Atlantis" not found. Please check the spelling and try again.'
      );

      current.mockResolvedValueOnce({ kind: 'transient', reason: 'timeout' });
      expect((await send('/weather Atlantis'))[0].text).toBe(
        "❌ Sorry, I couldn't fetch weather data right now. Please try again later."
      );
    });

    it('uses the forecast error text for forecast failures', async () => {
      vi.spyOn(env.services.weather, 'forecast').mockResolvedValue({ kind: 'transient', reason: 'http', status: 500 });

      expect((await send('/forecast Rome'))[0].text).toBe(
        "❌ Sorry, I couldn't fetch the forecast right now. Please try again later."
      );
    });

    it('renders the forecast', async () => {
      vi.spyOn(env.services.weather, 'forecast').mockResolvedValue({
        kind: 'ok',
        value: {
          city: 'Rome',
          country: 'IT',
          utcOffsetSeconds: 3600,
          days: [
            {
              date: '2026-03-02',
              minTemp: 8,
              maxTemp: 16,
              dominantCondition: 'Clear',
              conditionCode: 800,
              description: 'clear sky',
              precipitationChance: 0,
            },
          ],
        },
      });

      expect((await send('/forecast Rome'))[0].text).toBe(
        '📅 <b>5-day forecast for Rome, IT</b>\n\n☀️ <b>Monday (03/02)</b>\n   🌡️ 8°C - 16°C\n   📝 Clear Sky'
      );
    });

    it('reports threshold alerts', async () => {
      vi.spyOn(env.services.weather, 'currentWeather').mockResolvedValue({
        kind: 'ok',
        value: makeSnapshot({ temperature: 36, humidity: 50, windSpeed: 3, conditionCode: 800 }),
      });

      expect((await send('/alerts London'))[0].text).toBe(
        '⚠️ <b>Weather alerts for London, GB</b> (36°C)\n\n• 🔥 Extreme heat warning'
      );
    });
  });

  describe('search and map', () => {
    it('lists matches with a weather button each', async () => {
      const geocode = vi.spyOn(env.services.weather, 'geocode').mockResolvedValue({
        kind: 'ok',
        value: [
          makeMatch({ name: 'Springfield', state: 'Illinois', country: 'US' }),
          makeMatch({ name: 'Springs', state: null, country: 'ZA' }),
        ],
      });

      const [reply] = await send('/search spring');

      expect(geocode).toHaveBeenCalledWith('spring', 10);
      expect(reply.text).toBe('🔍 <b>Cities matching "spring":</b>\n\n1. Springfield, Illinois, US\n2. Springs, ZA');
      expect(reply.buttons).toEqual([
        [{ label: '🌤️ Springfield, Illinois, US', callback: 'weather:Springfield' }],
        [{ label: '🌤️ Springs, ZA', callback: 'weather:Springs' }],
      ]);
    });

    it('shows at most the display limit', async () => {
      setup({ SEARCH_DISPLAY_LIMIT: '1' });
      vi.spyOn(env.services.weather, 'geocode').mockResolvedValue({
        kind: 'ok',
        value: [makeMatch({ name: 'A', state: null }), makeMatch({ name: 'B', state: null })],
      });

      const [reply] = await send('/search x');

      expect(reply.buttons).toHaveLength(1);
      expect(reply.text).toBe('🔍 <b>Cities matching "x":</b>\n\n1. A, GB');
    });

    it('handles empty and failed searches', async () => {
      const geocode = vi.spyOn(env.services.weather, 'geocode');

      geocode.mockResolvedValueOnce({ kind: 'ok', value: [] });
      expect((await send('/search atlantis'))[0].text).toBe('🔍 No cities found for "atlantis".');

      geocode.mockResolvedValueOnce({ kind: 'transient', reason: 'network' });
      expect((await send('/search atlantis'))[0].text).toBe('❌ Sorry, the city search failed. Please try again later.');
    });

    it('links maps for the first match', async () => {
      const geocode = vi.spyOn(env.services.weather, 'geocode').mockResolvedValue({
        kind: 'ok',
        value: [makeMatch({ name: 'Paris', country: 'FR', state: 'Ile-de-France', lat: 48.85, lon: 2.35 })],
      });

      const [reply] = await send('/map Paris');

      expect(geocode).toHaveBeenCalledWith('Paris', 1);
      expect(reply.text).toBe('🗺️ <b>Weather maps for Paris, FR</b>');
      expect(reply.buttons).toEqual([
        [{
          label: '🗺️ OpenWeatherMap',
          url: 'https://openweathermap.org/weathermap?basemap=map&cities=true&layer=temperature&lat=48.85&lon=2.35&zoom=10',
        }],
        [{ label: '📍 Google Maps', url: 'https://www.google.com/maps/@48.85,2.35,10z' }],
      ]);
    });

    it('reports a map city with no matches as not found', async () => {
      vi.spyOn(env.services.weather, 'geocode').mockResolvedValue({ kind: 'ok', value: [] });

      expect((await send('/map Atlantis'))[0].text).toBe(
        '🚫 City "Atlantis" not found. Please check the spelling and try again.'
      );
    });
  });

  describe('compare', () => {
    it('needs at least two cities', async () => {
      expect((await send('/compare'))[0].text).toBe('Please list cities separated by commas. Usage: /compare London, Paris');
      expect((await send('/compare London'))[0].text).toBe('Please give at least two cities separated by commas.');
    });

    it('drops cities beyond the limit with a notice', async () => {
      const current = vi.spyOn(env.services.weather, 'currentWeather')
        .mockImplementation(async (city) => ({ kind: 'ok', value: makeSnapshot({ city }) }));

      const replies = await send('/compare A, B, C, D');

      expect(current.mock.calls.map(call => call[0])).toEqual(['A', 'B', 'C']);
      expect(replies).toHaveLength(2);
      expect(replies[0].text).toBe('⚠️ At most 3 cities can be compared. Using the first 3.');
      expect(replies[1].text.startsWith('📊 <b>Weather comparison</b>')).toBe(true);
    });

    it('aborts on the first city that cannot be found', async () => {
      vi.spyOn(env.services.weather, 'currentWeather').mockImplementation(async (city) =>
        city === 'Atlantis' ? { kind: 'not_found' } : { kind: 'ok', value: makeSnapshot({ city }) }
      );

      expect(await send('/compare London, Atlantis')).toEqual([
        { text: '🚫 City "Atlantis" not found. Please check the spelling and try again.', buttons: [], edit: false },
      ]);
    });

    it('uses the comparison error text for failed requests', async () => {
      vi.spyOn(env.services.weather, 'currentWeather').mockResolvedValue({ kind: 'transient', reason: 'timeout' });

      expect((await send('/compare London, Paris'))[0].text).toBe(
        "❌ Sorry, I couldn't fetch data for the comparison. Please try again later."
      );
    });
  });

  describe('favorites', () => {
    it('verifies typed cities before adding them', async () => {
      const exists = vi.spyOn(env.services.weather, 'cityExists').mockResolvedValue(true);

      expect((await send('/addfav Paris'))[0].text).toBe('⭐ Paris added to favorites.');
      expect(exists).toHaveBeenCalledWith('Paris', 'en');
      expect((await send('/addfav paris'))[0].text).toBe('paris is already in your favorites.');
      expect(exists).toHaveBeenCalledTimes(1);
      expect(prefs().favorites).toEqual(['Paris']);
    });

    it('rejects cities the provider does not know', async () => {
      vi.spyOn(env.services.weather, 'cityExists').mockResolvedValue(false);

      expect((await send('/addfav Atlantis'))[0].text).toBe(
        '🚫 City "Atlantis" not found. Please check the spelling and try again.'
      );
      expect(prefs().favorites).toEqual([]);
    });

    it('stops at the cap', async () => {
      vi.spyOn(env.services.weather, 'cityExists').mockResolvedValue(true);
      for (const city of ['A', 'B', 'C']) await send(`/addfav ${city}`);

      expect((await send('/addfav D'))[0].text).toBe('⚠️ You can keep at most 3 favorite cities. Remove one first.');
      expect(prefs().favorites).toEqual(['A', 'B', 'C']);
    });

    it('adds from a button without probing again', async () => {
      const exists = vi.spyOn(env.services.weather, 'cityExists');

      expect(await press('addfav:Rome')).toEqual([{ text: '⭐ Rome added to favorites.', buttons: [], edit: true }]);
      expect(exists).not.toHaveBeenCalled();
    });

    it('lists favorites with weather buttons and a manage button', async () => {
      expect((await send('/favorites'))[0].text).toBe(
        '⭐ You have no favorite cities yet. Add one with /addfav &lt;city&gt;.'
      );

      await press('addfav:Rome');
      await press('addfav:Oslo');
      const [reply] = await send('/favorites');

      expect(reply.text).toBe('⭐ <b>Your favorite cities (2):</b>');
      expect(reply.buttons).toEqual([
        [{ label: '🌤️ Rome', callback: 'weather:Rome' }],
        [{ label: '🌤️ Oslo', callback: 'weather:Oslo' }],
        [{ label: '📝 Manage favorites', callback: 'manage_favorites' }],
      ]);
    });

    it('removes in any letter case and refreshes the manage menu for buttons', async () => {
      await press('addfav:Rome');
      await press('addfav:Oslo');

      const replies = await press('removefav:rome');

      expect(replies).toEqual([
        { text: '🗑️ Rome removed from favorites.', buttons: [], edit: true },
        {
          text: '📝 <b>Manage favorites</b>\nTap a city to remove it.',
          buttons: [
            [{ label: '🗑️ Remove Oslo', callback: 'removefav:Oslo' }],
            [{ label: '⬅️ Back to settings', callback: 'back_to_settings' }],
          ],
          edit: false,
        },
      ]);
      expect((await send('/removefav Rome'))[0].text).toBe('Rome is not in your favorites.');
    });
  });

  describe('plain city messages', () => {
    beforeEach(() => {
      vi.spyOn(env.services.weather, 'currentWeather')
        .mockImplementation(async (city) => ({ kind: 'ok', value: makeSnapshot({ city }) }));
    });

    it('offers to add a new city to the favorites', async () => {
      vi.spyOn(env.services.weather, 'cityExists').mockResolvedValue(true);

      const [reply] = await send('"Berlin"');

      expect(reply.text.split('\n')[0]).toBe('🌧️ <b>Weather in Berlin, GB</b>');
      expect(reply.buttons).toEqual([[{ label: '⭐ Add to favorites', callback: 'addfav:Berlin' }]]);
    });

    it('skips the offer for a known favorite', async () => {
      const exists = vi.spyOn(env.services.weather, 'cityExists').mockResolvedValue(true);
      await press('addfav:Berlin');

      const [reply] = await send('berlin');

      expect(reply.buttons).toEqual([]);
      expect(exists).not.toHaveBeenCalled();
    });

    it('skips the offer when the provider does not confirm the city', async () => {
      vi.spyOn(env.services.weather, 'cityExists').mockResolvedValue(false);

      const [reply] = await send('Berlin');

      expect(reply.buttons).toEqual([]);
    });
  });

  describe('settings', () => {
    it('shows the current settings with their buttons', async () => {
      const [reply] = await send('/settings');

      expect(reply.text).toBe(
        '⚙️ <b>Settings</b>\n\n🌡️ Units: Celsius (°C)\n🌐 Language: English\n🏠 Default city: not set\n⭐ Favorites: 0'
      );
      expect(reply.buttons.map(row => row.map(b => b.label))).toEqual([
        ['🌡️ Units: Celsius (°C)'],
        ['🌐 Language: English'],
        ['🏠 Default city: not set'],
        ['📝 Manage favorites'],
        ['🔄 Reset settings'],
      ]);
    });

    it('toggles units and redraws the menu in place', async () => {
      const [reply] = await press('toggle_units');

      expect(prefs().unit).toBe('imperial');
      expect(reply.edit).toBe(true);
      expect(reply.text.split('\n')[2]).toBe('🌡️ Units: Fahrenheit (°F)');
    });

    it('offers every shipped language', async () => {
      const [reply] = await press('choose_language');

      expect(reply.text).toBe('🌐 <b>Choose your language:</b>');
      expect(reply.buttons).toEqual([
        [{ label: 'Arabic', callback: 'set_lang:ar' }],
        [{ label: 'English', callback: 'set_lang:en' }],
        [{ label: '⬅️ Back to settings', callback: 'back_to_settings' }],
      ]);
    });

    it('switches language and answers in the new one', async () => {
      const replies = await press('set_lang:ar');

      expect(prefs().language).toBe('ar');
      expect(replies[0]).toEqual({ text: '🌐 تم تعيين اللغة إلى العربية.', buttons: [], edit: true });
      expect(replies).toHaveLength(2);
    });

    it('refuses languages without a message table', async () => {
      expect((await press('set_lang:xx'))[0].text).toBe('🤷 That button is no longer available.');
      expect(prefs().language).toBe('en');
    });

    it('sets and clears the default city', async () => {
      const exists = vi.spyOn(env.services.weather, 'cityExists');

      exists.mockResolvedValueOnce(false);
      expect((await send('/setdefault Atlantis'))[0].text).toBe(
        '🚫 City "Atlantis" not found. Please check the spelling and try again.'
      );
      expect(prefs().defaultCity).toBeNull();

      exists.mockResolvedValueOnce(true);
      expect((await send('/setdefault Oslo'))[0].text).toBe('🏠 Default city set to Oslo.');
      expect(prefs().defaultCity).toBe('Oslo');

      expect((await send('/cleardefault'))[0].text).toBe('🏠 Default city cleared.');
      expect(prefs().defaultCity).toBeNull();
    });

    it('explains how to set the default city from the menu', async () => {
      expect((await press('set_default_city'))[0].text).toBe(
        '🏠 Send /setdefault &lt;city&gt; to choose your default city, or /cleardefault to remove it.'
      );
    });

    it('resets everything to defaults', async () => {
      await press('toggle_units');
      await press('addfav:Rome');

      expect((await press('reset_settings'))[0].text).toBe('🔄 Your settings have been reset to defaults.');
      expect(prefs()).toEqual({ unit: 'metric', language: 'en', favorites: [], defaultCity: null });
    });
  });
});
