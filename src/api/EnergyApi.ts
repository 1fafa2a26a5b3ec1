/**
 * Energy API
 * Station energy flow, daily statistics, sunrise/sunset and station metadata
 */

import { z } from 'zod';
import type { HttpClient } from '../client/HttpClient.js';
import { ApiError } from '../utils/errors.js';

/** Values are passed through as the portal reports them (kW, kWh, %). */
export type EnergyFlow = Record<string, unknown>;

export type DailyEnergySummary = Record<string, unknown>;

/** `dataTime` is "YYYYMMDD HH:MM" in station local time. */
export type ConsumptionDetail = Record<string, unknown>;

export type DailyConsumption = Record<string, unknown> & {
    consumptionDetailList: ConsumptionDetail[];
};

export type SunriseSunset = Record<string, unknown> & {
    sunriseTime?: string;
    sunsetTime?: string;
};

export type StationInfo = Record<string, unknown>;

const EnvelopeSchema = z.object({
    code: z.number(),
    msg: z.string().nullish(),
    data: z.unknown(),
});

const RecordSchema = z.record(z.unknown());

type ApiHttp = Pick<HttpClient, 'get'>;

export class EnergyApi {
    constructor(private readonly http: ApiHttp) {}

    /**
     * Real-time power flow for a station
     */
    async getEnergyFlow(stationId: string): Promise<EnergyFlow> {
        return this.request('Energy flow', '/device/sigen/station/energyflow', {
            id: stationId,
            refreshFlag: 'true',
        });
    }

    /**
     * PV generation, grid import/export, consumption and battery totals for one day
     * @param date `YYYYMMDD`
     */
    async getDailyEnergySummary(stationId: string, date: string): Promise<DailyEnergySummary> {
        return this.request('Daily energy summary', '/data-process/sigen/station/statistics/energy', {
            dateFlag: '1',
            endDate: date,
            startDate: date,
            stationId,
            fulfill: 'false',
        });
    }

    /**
     * Daily and hourly base-load consumption
     * @param date `YYYYMMDD`
     */
    async getDailyConsumption(stationId: string, date: string): Promise<DailyConsumption> {
        const data = await this.request('Daily consumption', '/data-process/sigen/station/statistics/station-consumption', {
            dateFlag: '1',
            endDate: date,
            startDate: date,
            stationId,
        });
        const details = data.consumptionDetailList;
        return {
            ...data,
            consumptionDetailList: Array.isArray(details) ? details.filter(isRecord) : [],
        };
    }

    /**
     * @param date `YYYYMMDD`
     */
    async getSunriseSunset(stationId: string, date: string): Promise<SunriseSunset> {
        const data = await this.request('Sunrise/sunset', '/device/sigen/device/weather/sun', { stationId, date });
        return {
            ...data,
            sunriseTime: typeof data.sunriseTime === 'string' ? data.sunriseTime : undefined,
            sunsetTime: typeof data.sunsetTime === 'string' ? data.sunsetTime : undefined,
        };
    }

    async getStationInfo(): Promise<StationInfo> {
        return this.request('Station info', '/device/owner/station/home');
    }

    private async request(
        label: string,
        path: string,
        params?: Record<string, string>,
    ): Promise<Record<string, unknown>> {
        const body = await this.http.get<unknown>(path, params ? { params } : undefined);

        const envelope = EnvelopeSchema.safeParse(body);
        if (!envelope.success) {
            throw new ApiError(`${label}: unexpected response shape`);
        }

        const { code, msg, data } = envelope.data;
        if (code !== 0) {
            throw new ApiError(`${label}: API error code ${code}, ${msg || 'no message'}`, { code });
        }

        const record = RecordSchema.safeParse(data);
        if (!record.success) {
            throw new ApiError(`${label}: response has no data object`, { code });
        }
        return record.data;
    }
}

function isRecord(value: unknown): value is ConsumptionDetail {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
