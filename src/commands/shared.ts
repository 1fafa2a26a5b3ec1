/**
 * Shared command utilities
 * Builds the token manager, sink and collector from the resolved configuration
 */

import { getConfig, type Config } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { TokenManager } from '../auth/TokenManager.js';
import { FileStore } from '../auth/FileStore.js';
import { EnvStore } from '../auth/EnvStore.js';
import type { TokenStore } from '../auth/TokenStore.js';
import { HttpClient } from '../client/HttpClient.js';
import { WeatherApi, OPEN_METEO_BASE_URL } from '../api/WeatherApi.js';
import { Collector, energyApiFactory } from '../collector/Collector.js';
import { InfluxSink } from '../sink/InfluxSink.js';
import { ConsoleSink } from '../sink/ConsoleSink.js';
import type { PointSink } from '../sink/PointSink.js';

export function createTokenStore(config: Config): TokenStore {
    return config.tokenStore === 'env' ? new EnvStore() : new FileStore(config.tokenFile);
}

export function createTokenManager(config: Config = getConfig()): TokenManager {
    return new TokenManager(
        {
            tokenUrl: config.auth.tokenUrl,
            clientAuth: config.auth.clientAuth,
            username: config.auth.username,
            encodedPassword: config.auth.encodedPassword,
        },
        { store: createTokenStore(config) },
    );
}

export function createSink(config: Config, dryRun: boolean): PointSink {
    if (dryRun) return new ConsoleSink();

    const { url, token, org, bucket } = config.influx;
    if (!token || !org || !bucket) {
        throw new ConfigError('InfluxDB is not configured: set INFLUXDB_TOKEN, INFLUXDB_ORG and INFLUXDB_BUCKET (or use --dry-run)');
    }
    return new InfluxSink({ url, token, org, bucket });
}

export function createCollector(config: Config, sink: PointSink): Collector {
    return new Collector(
        {
            stationId: config.stationId,
            timezone: config.timezone,
            weather: config.weather,
        },
        {
            tokenManager: createTokenManager(config),
            weatherApi: new WeatherApi(new HttpClient({ baseUrl: OPEN_METEO_BASE_URL, timeout: 15000 })),
            sink,
            createEnergyApi: energyApiFactory(config.baseUrl),
        },
    );
}
