/**
 * InfluxDB sink
 * Writes points through the v2 write API with millisecond precision
 */

import { InfluxDB, Point, type WriteApi, type WritePrecisionType } from '@influxdata/influxdb-client';
import type { PointSink } from './PointSink.js';
import type { MetricPoint } from './points.js';
import { SinkError, errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export interface InfluxSinkConfig {
    url: string;
    token: string;
    org: string;
    bucket: string;
}

type PointWriter = Pick<WriteApi, 'writePoints' | 'flush' | 'close'>;

export const WRITE_PRECISION: WritePrecisionType = 'ms';

export function toInfluxPoint(point: MetricPoint): Point {
    const influxPoint = new Point(point.measurement).timestamp(point.timestamp);
    for (const [key, value] of Object.entries(point.tags)) {
        influxPoint.tag(key, value);
    }
    for (const [key, value] of Object.entries(point.fields)) {
        if (typeof value === 'number') influxPoint.floatField(key, value);
        else if (typeof value === 'boolean') influxPoint.booleanField(key, value);
        else influxPoint.stringField(key, value);
    }
    return influxPoint;
}

export class InfluxSink implements PointSink {
    private readonly writer: PointWriter;
    private readonly bucket: string;

    constructor(config: InfluxSinkConfig, writer?: PointWriter) {
        this.bucket = config.bucket;
        this.writer =
            writer ??
            new InfluxDB({ url: config.url, token: config.token }).getWriteApi(config.org, config.bucket, WRITE_PRECISION);
    }

    async write(points: MetricPoint[]): Promise<void> {
        if (points.length === 0) return;

        try {
            this.writer.writePoints(points.map(toInfluxPoint));
            await this.writer.flush();
            log.debug(`InfluxDB: wrote ${points.length} point(s) to ${this.bucket}`);
        } catch (error) {
            throw new SinkError(`InfluxDB write failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async close(): Promise<void> {
        try {
            await this.writer.close();
        } catch (error) {
            throw new SinkError(`InfluxDB close failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}
