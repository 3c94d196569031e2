/**
 * Weather module
 * Resolves a place name with the Open-Meteo geocoding API, then reads the
 * current conditions from the Open-Meteo forecast API. No credential needed.
 *
 * fetchWeather never throws: every failure becomes an `unavailable` lookup
 * so the query can go on without weather.
 */

import axios from 'axios';
import { WeatherLookup, WeatherSnapshot } from './types';
import { describeError } from './errors';
import { logger } from './logger';

export const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
export const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

// WMO weather interpretation codes
const WEATHER_CODES: Record<number, string> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Depositing rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  56: 'Light freezing drizzle',
  57: 'Dense freezing drizzle',
  61: 'Slight rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  66: 'Light freezing rain',
  67: 'Heavy freezing rain',
  71: 'Slight snow fall',
  73: 'Moderate snow fall',
  75: 'Heavy snow fall',
  77: 'Snow grains',
  80: 'Slight rain showers',
  81: 'Moderate rain showers',
  82: 'Violent rain showers',
  85: 'Slight snow showers',
  86: 'Heavy snow showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm with slight hail',
  99: 'Thunderstorm with heavy hail'
};

export function describeWeatherCode(code: number): string {
  return WEATHER_CODES[code] ?? `Unknown conditions (code ${code})`;
}

interface GeocodingResponse {
  results?: Array<{
    name?: string;
    latitude?: number;
    longitude?: number;
    country?: string;
  }>;
}

interface ForecastResponse {
  current?: {
    time?: string;
    temperature_2m?: number;
    relative_humidity_2m?: number;
    precipitation?: number;
    weather_code?: number;
  };
}

interface Coordinates {
  name: string;
  latitude: number;
  longitude: number;
}

export interface WeatherFetcher {
  fetchWeather(locationName: string): Promise<WeatherLookup>;
}

export interface WeatherClientOptions {
  timeoutMs?: number;
  geocodingUrl?: string;
  forecastUrl?: string;
}

class WeatherLookupError extends Error {}

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
}

export class WeatherClient implements WeatherFetcher {
  private timeoutMs: number;
  private geocodingUrl: string;
  private forecastUrl: string;

  constructor(options: WeatherClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.geocodingUrl = options.geocodingUrl ?? GEOCODING_URL;
    this.forecastUrl = options.forecastUrl ?? FORECAST_URL;
  }

  /**
   * Current weather for a place name, or an explicit unavailable signal
   */
  async fetchWeather(locationName: string): Promise<WeatherLookup> {
    const location = locationName.trim();
    if (!location) {
      return { status: 'unavailable', location, reason: 'No location given' };
    }

    try {
      const coordinates = await this.geocode(location);
      const snapshot = await this.currentConditions(coordinates);
      logger.info(`Weather for ${snapshot.location}: ${snapshot.temperature}°C, ${snapshot.conditions}`);
      return { status: 'available', snapshot };
    } catch (error) {
      const reason = isTimeout(error)
        ? `Weather service timed out after ${this.timeoutMs}ms`
        : error instanceof WeatherLookupError
          ? error.message
          : `Weather service error: ${describeError(error)}`;
      logger.warn(`Weather unavailable for "${location}"`, reason);
      return { status: 'unavailable', location, reason };
    }
  }

  private async geocode(location: string): Promise<Coordinates> {
    const response = await axios.get<GeocodingResponse>(this.geocodingUrl, {
      params: { name: location, count: 1, language: 'en', format: 'json' },
      timeout: this.timeoutMs
    });

    const place = response.data?.results?.[0];
    if (!place || typeof place.latitude !== 'number' || typeof place.longitude !== 'number') {
      throw new WeatherLookupError(`Location not found: ${location}`);
    }

    const name = place.name ?? location;
    return {
      name: place.country ? `${name}, ${place.country}` : name,
      latitude: place.latitude,
      longitude: place.longitude
    };
  }

  private async currentConditions(coordinates: Coordinates): Promise<WeatherSnapshot> {
    const response = await axios.get<ForecastResponse>(this.forecastUrl, {
      params: {
        latitude: coordinates.latitude,
        longitude: coordinates.longitude,
        current: 'temperature_2m,relative_humidity_2m,precipitation,weather_code',
        timezone: 'GMT'
      },
      timeout: this.timeoutMs
    });

    const current = response.data?.current;
    if (
      !current ||
      typeof current.temperature_2m !== 'number' ||
      typeof current.precipitation !== 'number' ||
      typeof current.weather_code !== 'number'
    ) {
      throw new WeatherLookupError('Malformed forecast response');
    }

    const timestamp = current.time ? new Date(`${current.time}Z`) : new Date();

    return {
      location: coordinates.name,
      temperature: current.temperature_2m,
      conditions: describeWeatherCode(current.weather_code),
      precipitation: current.precipitation,
      humidity: current.relative_humidity_2m,
      timestamp: Number.isNaN(timestamp.getTime()) ? new Date() : timestamp
    };
  }
}
