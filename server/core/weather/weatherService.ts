import { z } from 'zod';
import { config } from '../config';
import { logger } from '../logger';
import { countCached, getCachedEntry, setCache } from '../queryCache';
import { AbortError, withWeatherRetry } from '../retryUtils';
import { getErrorMessage } from '../../utils/errorUtils';

const WEATHER_CACHE_PREFIX = 'weather:';
const REQUEST_TIMEOUT_MS = 10000;

export interface WeatherSnapshot {
  location: string;
  region: string | null;
  country: string | null;
  temperature: number;
  condition: string;
  icon: string | null;
  humidity: number;
  windSpeed: number;
  windDirection: string | null;
  uvIndex: number | null;
  recommendation: string;
  cached: boolean;
  mock: boolean;
  fetchedAt: string;
}

export interface WeatherStatus {
  cacheEntries: number;
  apiKeyConfigured: boolean;
  checkedAt: string;
}

const weatherstackSchema = z.object({
  location: z.object({
    name: z.string(),
    region: z.string().nullish(),
    country: z.string().nullish(),
  }),
  current: z.object({
    temperature: z.number(),
    weather_descriptions: z.array(z.string()).default([]),
    weather_icons: z.array(z.string()).default([]),
    humidity: z.number(),
    wind_speed: z.number(),
    wind_dir: z.string().nullish(),
    uv_index: z.number().nullish(),
  }),
});

const weatherstackErrorSchema = z.object({
  success: z.literal(false).optional(),
  error: z.object({
    code: z.number().optional(),
    info: z.string().optional(),
  }),
});

class WeatherHttpError extends Error {
  constructor(public status: number) {
    super(`Weather API responded with HTTP ${status}`);
    this.name = 'WeatherHttpError';
  }
}

export function cacheKeyFor(location: string): string {
  return `${WEATHER_CACHE_PREFIX}${location.trim().toLowerCase().replace(/\s+/g, '_')}`;
}

export function lawnCareRecommendation(temperature: number, condition: string, windSpeed: number): string {
  const text = condition.toLowerCase();
  if (/(rain|shower|drizzle|thunder|storm)/.test(text)) {
    return 'Rain in the forecast. Hold off on mowing and fertilizing until the lawn dries out.';
  }
  if (/(snow|sleet|ice|freez)/.test(text) || temperature <= 40) {
    return 'Too cold for most lawn work. Keep foot traffic off frosted grass.';
  }
  if (temperature >= 90) {
    return 'Hot day. Water early in the morning and raise the mower deck.';
  }
  if (windSpeed >= 20) {
    return 'Windy conditions. Skip spraying weed control today.';
  }
  return 'Good conditions for mowing and lawn treatments.';
}

export function fallbackWeather(location: string): WeatherSnapshot {
  const temperature = 72;
  const condition = 'Partly Cloudy';
  const windSpeed = 8;
  return {
    location,
    region: 'Local Area',
    country: 'United States',
    temperature,
    condition,
    icon: null,
    humidity: 65,
    windSpeed,
    windDirection: 'SW',
    uvIndex: 5,
    recommendation: lawnCareRecommendation(temperature, condition, windSpeed),
    cached: false,
    mock: true,
    fetchedAt: new Date().toISOString(),
  };
}

async function fetchFromApi(location: string, apiKey: string): Promise<WeatherSnapshot> {
  const url = new URL(config.weather.apiUrl);
  url.searchParams.set('access_key', apiKey);
  url.searchParams.set('query', location);
  url.searchParams.set('units', 'f');

  const response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
  if (!response.ok) {
    throw new WeatherHttpError(response.status);
  }

  const body: unknown = await response.json();
  const apiError = weatherstackErrorSchema.safeParse(body);
  if (apiError.success) {
    // weatherstack reports bad keys and unknown places with HTTP 200
    throw new AbortError(apiError.data.error.info ?? 'Weather API returned an error');
  }
  const parsed = weatherstackSchema.safeParse(body);
  if (!parsed.success) {
    throw new AbortError('Weather API returned an unexpected payload');
  }

  const { location: place, current } = parsed.data;
  const condition = current.weather_descriptions[0] ?? 'Unknown';
  return {
    location: place.name,
    region: place.region ?? null,
    country: place.country ?? null,
    temperature: current.temperature,
    condition,
    icon: current.weather_icons[0] ?? null,
    humidity: current.humidity,
    windSpeed: current.wind_speed,
    windDirection: current.wind_dir ?? null,
    uvIndex: current.uv_index ?? null,
    recommendation: lawnCareRecommendation(current.temperature, condition, current.wind_speed),
    cached: false,
    mock: false,
    fetchedAt: new Date().toISOString(),
  };
}

/**
 * Current conditions for a location. Never throws: when the API is
 * unreachable, misconfigured or answers with an error, a fixed fallback
 * snapshot is returned with `mock: true`. Only real answers are cached.
 */
export async function currentConditions(
  location: string = config.weather.defaultLocation,
  options: { retryDelayMs?: number } = {}
): Promise<WeatherSnapshot> {
  const query = location.trim() || config.weather.defaultLocation;
  const key = cacheKeyFor(query);

  const hit = getCachedEntry<WeatherSnapshot>(key);
  if (hit) {
    return { ...hit.data, cached: true, fetchedAt: new Date(hit.cachedAt).toISOString() };
  }

  const apiKey = config.weather.apiKey;
  if (!apiKey) {
    logger.warn('[Weather] No API key configured, serving fallback conditions', { extra: { location: query } });
    return fallbackWeather(query);
  }

  try {
    const snapshot = await withWeatherRetry(() => fetchFromApi(query, apiKey), options.retryDelayMs);
    setCache(key, snapshot, config.weather.cacheTtlMs);
    logger.info('[Weather] Fetched current conditions', { extra: { location: query } });
    return snapshot;
  } catch (error: unknown) {
    logger.warn('[Weather] Falling back to static conditions', {
      extra: { location: query, reason: getErrorMessage(error) },
    });
    return fallbackWeather(query);
  }
}

export function weatherStatus(): WeatherStatus {
  return {
    cacheEntries: countCached(WEATHER_CACHE_PREFIX),
    apiKeyConfigured: Boolean(config.weather.apiKey),
    checkedAt: new Date().toISOString(),
  };
}
