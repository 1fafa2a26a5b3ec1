#!/usr/bin/env node
/**
 * solar-collector CLI
 * solarc: collect solar, battery and weather data into InfluxDB
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { createCollectCommand } from './commands/collect.js';
import { createAuthCommand } from './commands/auth.js';
import { createConfigCommand } from './commands/config.js';

const program = new Command();

program
    .name('solarc')
    .description('Poll the monitoring portal and Open-Meteo, write points to InfluxDB')
    .version(VERSION);

program.addCommand(createCollectCommand());
program.addCommand(createAuthCommand());
program.addCommand(createConfigCommand());

await program.parseAsync();
