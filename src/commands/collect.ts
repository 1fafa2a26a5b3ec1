/**
 * Collect CLI Command
 * solarc collect [--tasks flow,weather] [--yesterday] [--dry-run]
 */

import { Command } from 'commander';
import { getConfig } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { log, setVerbose } from '../utils/logger.js';
import { DEFAULT_TASKS, TASKS, isTaskName, type CycleReport, type TaskName } from '../collector/Collector.js';
import { createCollector, createSink } from './shared.js';

export function parseTasks(value: string): TaskName[] {
    const names = value
        .split(',')
        .map((name) => name.trim().toLowerCase())
        .filter(Boolean);

    if (names.includes('all')) return [...TASKS];

    const unknown = names.filter((name) => !isTaskName(name));
    if (unknown.length > 0) {
        throw new Error(`Unknown task(s): ${unknown.join(', ')}. Valid: ${TASKS.join(', ')}, all`);
    }
    return names.filter(isTaskName);
}

export function printReport(report: CycleReport): void {
    log.header(`Cycle ${report.startedAt.toISOString()}`);
    if (report.token !== 'not-needed') log.kv('Access token', report.token);
    for (const task of report.tasks) {
        log.kv(task.name, task.error ? `${task.status} (${task.error})` : `${task.status}, ${task.points} point(s)`);
    }
}

export function createCollectCommand(): Command {
    return new Command('collect')
        .description('Run one collection cycle and write the results to InfluxDB')
        .option('-t, --tasks <list>', `Comma-separated tasks: ${TASKS.join(', ')}, all`, DEFAULT_TASKS.join(','))
        .option('--yesterday', 'Also collect yesterday\'s consumption statistics')
        .option('--dry-run', 'Print points instead of writing them')
        .option('-v, --verbose', 'Debug output')
        .action(async (options: { tasks: string; yesterday?: boolean; dryRun?: boolean; verbose?: boolean }) => {
            if (options.verbose) setVerbose(true);

            try {
                const tasks = parseTasks(options.tasks);
                const config = getConfig();
                const collector = createCollector(config, createSink(config, Boolean(options.dryRun)));

                const report = await collector.run(tasks, { includeYesterday: Boolean(options.yesterday) });
                printReport(report);

                if (!report.ok) process.exitCode = 1;
            } catch (error) {
                log.error(`Collection failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });
}
