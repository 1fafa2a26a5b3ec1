/**
 * Console sink
 * Prints points instead of writing them (collect --dry-run)
 */

import chalk from 'chalk';
import type { PointSink } from './PointSink.js';
import type { MetricPoint } from './points.js';

export function formatPoint(point: MetricPoint): string {
    const tags = Object.entries(point.tags)
        .map(([key, value]) => `${key}=${value}`)
        .join(',');
    const fields = Object.entries(point.fields)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? JSON.stringify(value) : value}`)
        .join(',');
    return `${point.measurement}${tags ? ',' + tags : ''} ${fields} ${point.timestamp.toISOString()}`;
}

export class ConsoleSink implements PointSink {
    written = 0;

    async write(points: MetricPoint[]): Promise<void> {
        for (const point of points) {
            console.log(chalk.dim('  →'), formatPoint(point));
        }
        this.written += points.length;
    }

    async close(): Promise<void> {
        console.log(chalk.dim(`  ${this.written} point(s) not written (dry run)`));
    }
}
