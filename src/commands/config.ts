/**
 * Config CLI Commands
 * solarc config show | set <key> <value> | path
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import {
    SETTABLE_KEYS,
    clearConfigCache,
    getConfig,
    getConfigFilePath,
    isSettableKey,
    updateSavedConfig,
} from '../utils/config.js';

const SECRET_KEYS = new Set(['encodedPassword', 'influx.token', 'clientAuth']);

function mask(value: string | undefined): string {
    if (!value) return '(not set)';
    return value.length <= 4 ? '••••' : '••••••' + value.slice(-4);
}

export function createConfigCommand(): Command {
    const config = new Command('config').description('Manage solar-collector configuration');

    config
        .command('show')
        .description('Show the resolved configuration (env > config file > .env)')
        .action(() => {
            try {
                const resolved = getConfig();
                log.header('Resolved configuration');
                log.kv('Username', resolved.auth.username || '(not set)');
                log.kv('Encoded Password', mask(resolved.auth.encodedPassword));
                log.kv('Token URL', resolved.auth.tokenUrl);
                log.kv('Base URL', resolved.baseUrl);
                log.kv('Station ID', resolved.stationId || '(not set)');
                log.kv('Token Store', resolved.tokenStore === 'file' ? resolved.tokenFile : 'environment');
                log.kv('Time Zone', resolved.timezone);
                log.kv('InfluxDB', `${resolved.influx.url} ${resolved.influx.org ?? '?'}/${resolved.influx.bucket ?? '?'}`);
                log.kv('InfluxDB Token', mask(resolved.influx.token));
                log.kv(
                    'Weather',
                    resolved.weather.latitude !== undefined && resolved.weather.longitude !== undefined
                        ? `${resolved.weather.latitude}, ${resolved.weather.longitude} (${resolved.weather.timezone})`
                        : '(not set)',
                );
            } catch (error) {
                log.error(errorMessage(error));
                process.exitCode = 1;
            }
        });

    config
        .command('set')
        .description(`Save a value to the config file. Keys: ${SETTABLE_KEYS.join(', ')}`)
        .argument('<key>', 'Config key')
        .argument('<value>', 'Value')
        .action((key: string, value: string) => {
            if (!isSettableKey(key)) {
                log.error(`Unknown key "${key}". Valid keys: ${SETTABLE_KEYS.join(', ')}`);
                process.exitCode = 1;
                return;
            }
            try {
                updateSavedConfig(key, value);
                clearConfigCache();
                log.success(`${key} = ${SECRET_KEYS.has(key) ? mask(value) : value}`);
            } catch (error) {
                log.error(errorMessage(error));
                process.exitCode = 1;
            }
        });

    config
        .command('path')
        .description('Print the config file location')
        .action(() => {
            console.log(getConfigFilePath());
        });

    return config;
}
