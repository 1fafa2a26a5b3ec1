/**
 * Collector
 * One collection cycle: obtain the token once, run the selected tasks, write their points
 */

import type { TokenManager } from '../auth/TokenManager.js';
import { EnergyApi } from '../api/EnergyApi.js';
import type { WeatherApi } from '../api/WeatherApi.js';
import { HttpClient } from '../client/HttpClient.js';
import type { PointSink } from '../sink/PointSink.js';
import {
    dailyConsumptionPoints,
    dailySummaryPoints,
    energyFlowPoints,
    solarEventPoints,
    stationInfoPoints,
    weatherPoints,
    type MetricPoint,
} from '../sink/points.js';
import { addDays, localDateOf, toApiDate } from '../utils/dates.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export const TASKS = ['flow', 'summary', 'consumption', 'sun', 'station', 'weather'] as const;

export type TaskName = (typeof TASKS)[number];

type EnergyTask = Exclude<TaskName, 'weather'>;

export const DEFAULT_TASKS: readonly TaskName[] = ['flow', 'weather'];

export function isTaskName(value: string): value is TaskName {
    return (TASKS as readonly string[]).includes(value);
}

export interface TaskReport {
    name: TaskName;
    status: 'ok' | 'skipped' | 'failed';
    points: number;
    error?: string;
}

export interface CycleReport {
    startedAt: Date;
    token: 'ok' | 'failed' | 'not-needed';
    tasks: TaskReport[];
    ok: boolean;
}

export interface CollectorSettings {
    stationId?: string;
    timezone: string;
    weather: {
        latitude?: number;
        longitude?: number;
        timezone: string;
    };
}

export interface CollectorDeps {
    tokenManager: Pick<TokenManager, 'getActiveAccessToken'>;
    weatherApi: WeatherApi;
    sink: PointSink;
    /** Builds the energy API around the token obtained for this cycle */
    createEnergyApi: (accessToken: string) => EnergyApi;
}

export interface RunOptions {
    now?: Date;
    /** Also collect yesterday's consumption (useful just after midnight) */
    includeYesterday?: boolean;
}

export function energyApiFactory(baseUrl: string): (accessToken: string) => EnergyApi {
    return (accessToken) =>
        new EnergyApi(
            new HttpClient({
                baseUrl,
                getAccessToken: () => accessToken,
                headers: { lang: 'en_US', 'auth-client-id': 'sigen' },
            }),
        );
}

export class Collector {
    constructor(
        private readonly settings: CollectorSettings,
        private readonly deps: CollectorDeps,
    ) {}

    async run(tasks: readonly TaskName[], options: RunOptions = {}): Promise<CycleReport> {
        const startedAt = options.now ?? new Date();
        const selected = TASKS.filter((task) => tasks.includes(task));
        const reports: TaskReport[] = [];
        let token: CycleReport['token'] = 'not-needed';

        try {
            const energyTasks = selected.filter((task): task is EnergyTask => task !== 'weather');
            if (energyTasks.length > 0) {
                const result = await this.deps.tokenManager.getActiveAccessToken();
                if (result.ok) {
                    token = 'ok';
                    const api = this.deps.createEnergyApi(result.token);
                    for (const task of energyTasks) {
                        reports.push(await this.runTask(task, () => this.energyTask(api, task, startedAt, options)));
                    }
                } else {
                    token = 'failed';
                    log.error(`No access token this cycle: ${result.error.message}`);
                    for (const task of energyTasks) {
                        reports.push({ name: task, status: 'skipped', points: 0, error: 'no access token' });
                    }
                }
            }

            if (selected.includes('weather')) {
                reports.push(await this.runTask('weather', () => this.weatherTask(startedAt)));
            }
        } finally {
            try {
                await this.deps.sink.close();
            } catch (error) {
                log.error(`Closing sink failed: ${errorMessage(error)}`);
            }
        }

        return {
            startedAt,
            token,
            tasks: reports,
            ok: token !== 'failed' && reports.every((report) => report.status !== 'failed'),
        };
    }

    private async runTask(name: TaskName, collect: () => Promise<MetricPoint[] | string>): Promise<TaskReport> {
        try {
            const outcome = await collect();
            if (typeof outcome === 'string') {
                log.warn(`${name}: skipped (${outcome})`);
                return { name, status: 'skipped', points: 0, error: outcome };
            }
            await this.deps.sink.write(outcome);
            log.success(`${name}: ${outcome.length} point(s)`);
            return { name, status: 'ok', points: outcome.length };
        } catch (error) {
            const message = errorMessage(error);
            log.error(`${name}: ${message}`);
            return { name, status: 'failed', points: 0, error: message };
        }
    }

    /**
     * @returns the points to write, or the reason the task was skipped
     */
    private async energyTask(
        api: EnergyApi,
        task: EnergyTask,
        now: Date,
        options: RunOptions,
    ): Promise<MetricPoint[] | string> {
        const { stationId, timezone } = this.settings;
        if (!stationId) return 'SIGEN_STATION_ID is not configured';

        const today = localDateOf(now, timezone);

        switch (task) {
            case 'flow':
                return energyFlowPoints(await api.getEnergyFlow(stationId), stationId, now);
            case 'summary':
                return dailySummaryPoints(
                    await api.getDailyEnergySummary(stationId, toApiDate(today)),
                    stationId,
                    today,
                    timezone,
                );
            case 'consumption': {
                const days = options.includeYesterday ? [today, addDays(today, -1)] : [today];
                const points: MetricPoint[] = [];
                for (const day of days) {
                    const data = await api.getDailyConsumption(stationId, toApiDate(day));
                    points.push(...dailyConsumptionPoints(data, stationId, day, timezone));
                }
                return points;
            }
            case 'sun':
                return solarEventPoints(
                    await api.getSunriseSunset(stationId, toApiDate(today)),
                    stationId,
                    today,
                    timezone,
                );
            case 'station':
                return stationInfoPoints(await api.getStationInfo(), stationId, now);
        }
    }

    private async weatherTask(now: Date): Promise<MetricPoint[] | string> {
        const { latitude, longitude, timezone } = this.settings.weather;
        if (latitude === undefined || longitude === undefined) {
            return 'WEATHER_LATITUDE/WEATHER_LONGITUDE are not configured';
        }
        log.debug(`Fetching forecast for ${latitude}, ${longitude} at ${now.toISOString()}`);
        const forecast = await this.deps.weatherApi.getForecast({ latitude, longitude, timezone });
        return weatherPoints(forecast, this.settings.stationId ?? 'unknown', timezone);
    }
}
