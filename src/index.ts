/**
 * solar-collector library barrel export
 */

// Auth
export {
    TokenManager,
    type TokenManagerConfig,
    type TokenManagerOptions,
    type TokenResult,
    type CredentialState,
    type TraceStep,
    type AuthStatus,
} from './auth/TokenManager.js';
export {
    PasswordGrantFlow,
    type PasswordGrantConfig,
    type GrantClient,
    type GrantResult,
    type TokenTransport,
} from './auth/PasswordGrantFlow.js';
export { FileStore } from './auth/FileStore.js';
export { MemoryStore } from './auth/MemoryStore.js';
export { EnvStore } from './auth/EnvStore.js';
export { SAFETY_MARGIN_SECONDS, isUsable, type CredentialSet, type TokenStore } from './auth/TokenStore.js';

// APIs
export { EnergyApi, type EnergyFlow, type DailyConsumption, type SunriseSunset, type StationInfo } from './api/EnergyApi.js';
export { WeatherApi, type Forecast, type ForecastQuery } from './api/WeatherApi.js';

// Collection
export { Collector, TASKS, type TaskName, type CycleReport, type TaskReport } from './collector/Collector.js';
export { InfluxSink, type InfluxSinkConfig } from './sink/InfluxSink.js';
export { ConsoleSink } from './sink/ConsoleSink.js';
export type { PointSink } from './sink/PointSink.js';
export type { MetricPoint, FieldValue } from './sink/points.js';

// Utils
export { HttpClient, type HttpClientConfig } from './client/HttpClient.js';
export { TokenError, ApiError, ConfigError, SinkError, type TokenErrorKind } from './utils/errors.js';
