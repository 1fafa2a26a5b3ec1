/**
 * Weather API
 * Current conditions and hourly forecast from Open-Meteo (no key required)
 */

import { z } from 'zod';
import type { HttpClient } from '../client/HttpClient.js';
import { ApiError } from '../utils/errors.js';

export const OPEN_METEO_BASE_URL = 'https://api.open-meteo.com';

export const HOURLY_VARIABLES = [
    'temperature_2m',
    'relative_humidity_2m',
    'apparent_temperature',
    'precipitation_probability',
    'precipitation',
    'weather_code',
    'cloud_cover',
    'shortwave_radiation',
    'direct_radiation',
    'diffuse_radiation',
    'wind_speed_10m',
    'wind_direction_10m',
] as const;

export interface ForecastQuery {
    latitude: number;
    longitude: number;
    timezone: string;
    forecastDays?: number;
}

const ForecastSchema = z
    .object({
        timezone: z.string().optional(),
        current_weather: z.record(z.unknown()).optional(),
        hourly: z.record(z.array(z.unknown())).optional(),
    })
    .passthrough();

export type Forecast = z.infer<typeof ForecastSchema>;

type ApiHttp = Pick<HttpClient, 'get'>;

export class WeatherApi {
    constructor(private readonly http: ApiHttp) {}

    async getForecast(query: ForecastQuery): Promise<Forecast> {
        const body = await this.http.get<unknown>('/v1/forecast', {
            params: {
                latitude: query.latitude,
                longitude: query.longitude,
                current_weather: 'true',
                hourly: HOURLY_VARIABLES.join(','),
                timezone: query.timezone,
                forecast_days: query.forecastDays ?? 2,
            },
        });

        const parsed = ForecastSchema.safeParse(body);
        if (!parsed.success) {
            throw new ApiError('Weather forecast: unexpected response shape');
        }
        return parsed.data;
    }
}
