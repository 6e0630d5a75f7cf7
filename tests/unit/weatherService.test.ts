import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('../../server/core/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../server/core/logger')>()),
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import { config } from '../../server/core/config';
import { clearAllCaches } from '../../server/core/queryCache';
import {
  cacheKeyFor,
  currentConditions,
  lawnCareRecommendation,
  weatherStatus,
} from '../../server/core/weather/weatherService';

const FAST = { retryDelayMs: 1 };

function weatherstackBody(name: string, temperature: number, description: string) {
  return {
    request: { type: 'City', query: name, language: 'en', unit: 'f' },
    location: { name, region: 'Florida', country: 'United States of America' },
    current: {
      temperature,
      weather_descriptions: [description],
      weather_icons: ['https://example.test/icon.png'],
      humidity: 70,
      wind_speed: 12,
      wind_dir: 'E',
      uv_index: 6,
    },
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const fetchMock = vi.fn<typeof fetch>();

describe('Weather service', () => {
  beforeEach(() => {
    clearAllCaches();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    config.weather.apiKey = 'test-key';
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps a weatherstack answer to a snapshot', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(weatherstackBody('Tampa', 81, 'Sunny')));

    const snapshot = await currentConditions('Tampa, FL', FAST);

    expect(snapshot).toMatchObject({
      location: 'Tampa',
      region: 'Florida',
      temperature: 81,
      condition: 'Sunny',
      humidity: 70,
      windSpeed: 12,
      windDirection: 'E',
      uvIndex: 6,
      recommendation: 'Good conditions for mowing and lawn treatments.',
      cached: false,
      mock: false,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.searchParams.get('access_key')).toBe('test-key');
    expect(requested.searchParams.get('query')).toBe('Tampa, FL');
    expect(requested.searchParams.get('units')).toBe('f');
  });

  it('serves repeat lookups from the cache under a normalized key', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(weatherstackBody('Tampa', 81, 'Sunny')));

    await currentConditions('Tampa, FL', FAST);
    const again = await currentConditions('  tampa,   fl ', FAST);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(again.cached).toBe(true);
    expect(again.temperature).toBe(81);
    expect(cacheKeyFor('Tampa, FL')).toBe('weather:tampa,_fl');
    expect(weatherStatus()).toMatchObject({ cacheEntries: 1, apiKeyConfigured: true });
  });

  it('falls back without retrying when the API reports an error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({
      success: false,
      error: { code: 101, type: 'invalid_access_key', info: 'You have not supplied a valid API Access Key.' },
    }));

    const snapshot = await currentConditions('Orlando', FAST);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(snapshot).toMatchObject({
      location: 'Orlando',
      temperature: 72,
      condition: 'Partly Cloudy',
      mock: true,
      cached: false,
    });
    expect(weatherStatus().cacheEntries).toBe(0);
  });

  it('retries a server error once', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ message: 'unavailable' }, 503))
      .mockResolvedValueOnce(jsonResponse(weatherstackBody('Miami', 88, 'Light Rain Shower')));

    const snapshot = await currentConditions('Miami, FL', FAST);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(snapshot.mock).toBe(false);
    expect(snapshot.recommendation).toBe('Rain in the forecast. Hold off on mowing and fertilizing until the lawn dries out.');
  });

  it('falls back after the retry also fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const snapshot = await currentConditions('Miami, FL', FAST);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(snapshot.mock).toBe(true);
  });

  it('does not call out without an API key', async () => {
    config.weather.apiKey = undefined;

    const snapshot = await currentConditions(undefined, FAST);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(snapshot).toMatchObject({ location: 'Miami, FL', mock: true });
    expect(weatherStatus().apiKeyConfigured).toBe(false);
  });
});

describe('lawnCareRecommendation', () => {
  it('reads the conditions in priority order', () => {
    expect(lawnCareRecommendation(95, 'Thunderstorm', 30)).toBe('Rain in the forecast. Hold off on mowing and fertilizing until the lawn dries out.');
    expect(lawnCareRecommendation(35, 'Clear', 5)).toBe('Too cold for most lawn work. Keep foot traffic off frosted grass.');
    expect(lawnCareRecommendation(94, 'Sunny', 5)).toBe('Hot day. Water early in the morning and raise the mower deck.');
    expect(lawnCareRecommendation(70, 'Sunny', 25)).toBe('Windy conditions. Skip spraying weed control today.');
    expect(lawnCareRecommendation(72, 'Partly Cloudy', 8)).toBe('Good conditions for mowing and lawn treatments.');
  });
});
