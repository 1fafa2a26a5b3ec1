/**
 * Tests for WeatherApi
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HOURLY_VARIABLES, WeatherApi } from '../../src/api/WeatherApi.js';

const mockGet = vi.fn();

describe('WeatherApi', () => {
    let api: WeatherApi;

    beforeEach(() => {
        vi.resetAllMocks();
        api = new WeatherApi({ get: mockGet });
    });

    it('should request current weather and the hourly variables', async () => {
        mockGet.mockResolvedValue({ timezone: 'Europe/Dublin', current_weather: { temperature: 14.2 } });

        await api.getForecast({ latitude: 53.35, longitude: -6.26, timezone: 'Europe/Dublin' });

        expect(mockGet).toHaveBeenCalledWith('/v1/forecast', {
            params: {
                latitude: 53.35,
                longitude: -6.26,
                current_weather: 'true',
                hourly: HOURLY_VARIABLES.join(','),
                timezone: 'Europe/Dublin',
                forecast_days: 2,
            },
        });
    });

    it('should pass a custom forecast length', async () => {
        mockGet.mockResolvedValue({});

        await api.getForecast({ latitude: 1, longitude: 2, timezone: 'UTC', forecastDays: 5 });

        expect(mockGet.mock.calls[0][1].params.forecast_days).toBe(5);
    });

    it('should keep fields beyond the ones it validates', async () => {
        const body = {
            timezone: 'Europe/Dublin',
            elevation: 12,
            hourly: { time: ['2024-06-12T00:00'], temperature_2m: [11.5] },
        };
        mockGet.mockResolvedValue(body);

        const result = await api.getForecast({ latitude: 1, longitude: 2, timezone: 'UTC' });

        expect(result).toEqual(body);
    });

    it('should reject a malformed body', async () => {
        mockGet.mockResolvedValue({ hourly: { time: 'not-a-list' } });

        await expect(api.getForecast({ latitude: 1, longitude: 2, timezone: 'UTC' })).rejects.toThrow(
            'Weather forecast: unexpected response shape',
        );
    });
});
