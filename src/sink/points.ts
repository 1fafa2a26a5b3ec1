/**
 * Point mapping
 * Turns API payloads into time-series points (measurement, tags, fields, timestamp)
 */

import type { DailyConsumption, DailyEnergySummary, EnergyFlow, StationInfo, SunriseSunset } from '../api/EnergyApi.js';
import type { Forecast } from '../api/WeatherApi.js';
import {
    isValidTimeZone,
    parseApiDateTime,
    parseClockTime,
    parseLocalIso,
    toIsoDate,
    zonedTimeToUtc,
    type LocalDate,
} from '../utils/dates.js';
import { log } from '../utils/logger.js';

export type FieldValue = number | string | boolean;

export interface MetricPoint {
    measurement: string;
    tags: Record<string, string>;
    fields: Record<string, FieldValue>;
    timestamp: Date;
}

const STATS_SOURCE = 'sigen_api_stats';

// A flow snapshot without these is not worth writing.
const CRITICAL_FLOW_FIELDS = ['pvPower', 'loadPower', 'batterySoc'];

/**
 * Numeric value of a payload entry: finite numbers, numeric strings and booleans (1/0).
 */
export function toNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function energyFlowPoints(data: EnergyFlow, stationId: string, now: Date): MetricPoint[] {
    const fields: Record<string, FieldValue> = {};

    for (const [key, value] of Object.entries(data)) {
        if (value === null || value === undefined) continue;
        const numeric = toNumber(value);
        if (numeric === null) {
            if (CRITICAL_FLOW_FIELDS.includes(key)) {
                log.warn(`Energy flow: critical field ${key} is not numeric (${JSON.stringify(value)}); skipping point`);
                return [];
            }
            log.debug(`Energy flow: skipping non-numeric field ${key}`);
            continue;
        }
        fields[key] = numeric;
    }

    if (Object.keys(fields).length === 0) return [];
    return [{ measurement: 'energy_metrics', tags: { station_id: stationId }, fields, timestamp: now }];
}

export function dailySummaryPoints(
    data: DailyEnergySummary,
    stationId: string,
    date: LocalDate,
    timeZone: string,
): MetricPoint[] {
    const fields = numericFields(data);
    if (Object.keys(fields).length === 0) return [];

    return [
        {
            measurement: 'daily_energy_summary',
            tags: { station_id: stationId, source: STATS_SOURCE, date_local: toIsoDate(date) },
            fields,
            timestamp: zonedTimeToUtc(date, 0, 0, timeZone),
        },
    ];
}

export function dailyConsumptionPoints(
    data: DailyConsumption,
    stationId: string,
    date: LocalDate,
    timeZone: string,
): MetricPoint[] {
    const points: MetricPoint[] = [];
    const tags = { station_id: stationId, source: STATS_SOURCE };

    const total = toNumber(data.baseLoadConsumption);
    if (total !== null) {
        points.push({
            measurement: 'daily_consumption_summary',
            tags,
            fields: { total_base_load_kwh: total },
            timestamp: zonedTimeToUtc(date, 0, 0, timeZone),
        });
    }

    const seen = new Set<string>();
    for (const detail of data.consumptionDetailList) {
        const dataTime = detail.dataTime;
        const hourly = toNumber(detail.baseLoadConsumption);
        if (typeof dataTime !== 'string' || hourly === null || seen.has(dataTime)) continue;
        seen.add(dataTime);

        const timestamp = parseApiDateTime(dataTime, timeZone);
        if (!timestamp) {
            log.warn(`Hourly consumption: cannot parse dataTime "${dataTime}"`);
            continue;
        }
        points.push({ measurement: 'hourly_consumption', tags, fields: { base_load_kwh: hourly }, timestamp });
    }

    return points;
}

export function solarEventPoints(
    data: SunriseSunset,
    stationId: string,
    date: LocalDate,
    timeZone: string,
): MetricPoint[] {
    if (!data.sunriseTime || !data.sunsetTime) return [];

    const events = [
        ['sunrise', data.sunriseTime],
        ['sunset', data.sunsetTime],
    ] as const;

    const points: MetricPoint[] = [];
    for (const [eventType, localTime] of events) {
        const clock = parseClockTime(localTime);
        if (!clock) {
            log.warn(`Solar events: cannot parse ${eventType} time "${localTime}"`);
            return [];
        }
        points.push({
            measurement: 'solar_events',
            tags: { station_id: stationId, event_type: eventType, date_local: toIsoDate(date) },
            fields: { time_str_local: localTime },
            timestamp: zonedTimeToUtc(date, clock.hour, clock.minute, timeZone),
        });
    }
    return points;
}

export function stationInfoPoints(data: StationInfo, stationId: string, now: Date): MetricPoint[] {
    const fields: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(data)) {
        const numeric = toNumber(value);
        if (numeric !== null) fields[key] = numeric;
        else if (typeof value === 'string' && value !== '') fields[key] = value;
    }

    if (Object.keys(fields).length === 0) return [];
    return [{ measurement: 'station_info', tags: { station_id: stationId }, fields, timestamp: now }];
}

/**
 * Current conditions plus one point per hourly forecast slot. Local times are
 * read in the response's own time zone.
 */
export function weatherPoints(data: Forecast, stationId: string, fallbackTimeZone: string): MetricPoint[] {
    const timeZone = data.timezone && isValidTimeZone(data.timezone) ? data.timezone : fallbackTimeZone;
    const tags = { station_id: stationId };
    const points: MetricPoint[] = [];

    const current = data.current_weather;
    if (current && typeof current.time === 'string') {
        const timestamp = parseLocalIso(current.time, timeZone);
        const fields: Record<string, FieldValue> = {};
        for (const [key, value] of Object.entries(current)) {
            if (key === 'time' || key === 'interval') continue;
            const field = toField(value);
            if (field !== null) fields[key] = field;
        }
        if (timestamp && Object.keys(fields).length > 0) {
            points.push({ measurement: 'weather_current', tags, fields, timestamp });
        }
    }

    const hourly = data.hourly ?? {};
    const times = hourly.time ?? [];
    times.forEach((slot, index) => {
        if (typeof slot !== 'string') return;
        const timestamp = parseLocalIso(slot, timeZone);
        if (!timestamp) {
            log.warn(`Weather: cannot parse hourly time "${slot}"`);
            return;
        }

        const fields: Record<string, FieldValue> = {};
        for (const [variable, values] of Object.entries(hourly)) {
            if (variable === 'time' || index >= values.length) continue;
            const field = toField(values[index]);
            if (field !== null) fields[variable] = field;
        }
        if (Object.keys(fields).length > 0) {
            points.push({ measurement: 'weather_forecast_hourly', tags, fields, timestamp });
        }
    });

    return points;
}

function numericFields(data: Record<string, unknown>): Record<string, FieldValue> {
    const fields: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(data)) {
        const numeric = toNumber(value);
        if (numeric !== null) fields[key] = numeric;
    }
    return fields;
}

function toField(value: unknown): FieldValue | null {
    if (value === null || value === undefined) return null;
    const numeric = toNumber(value);
    if (numeric !== null) return numeric;
    return typeof value === 'string' ? value : null;
}
