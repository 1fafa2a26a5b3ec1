/**
 * Point sink interface
 * Storage-agnostic destination for time-series points
 */

import type { MetricPoint } from './points.js';

export interface PointSink {
    /**
     * Writes a batch of points. An empty batch is a no-op.
     * @throws {SinkError} when the batch cannot be written
     */
    write(points: MetricPoint[]): Promise<void>;

    /** Flushes pending writes and releases the connection */
    close(): Promise<void>;
}
