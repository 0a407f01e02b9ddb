import { CONFIG } from '../config/config';
import { ErrorKind } from '../core/errors/ErrorKind';
import { Logger } from '../core/logging/Logger';
import { andThen, map } from '../core/propagation/Result';
import { wrapErr } from '../core/propagation/policies';
import { applyPortOverride, loadConfig } from '../interface/cli/configLoader';
import { runMain } from '../interface/cli/report';

// Usage: demo [config-file] [port]
const [configPath = CONFIG.DEMO.CONFIG_FILE, portOverride] = process.argv.slice(2);

void runMain(() => {
    const loaded = loadConfig(configPath);
    const config = portOverride === undefined
        ? loaded
        : andThen(loaded, value => applyPortOverride(value, portOverride));

    return map(wrapErr(config, ErrorKind.Custom, 'startup failed'), value => {
        Logger.info('Demo', `Starting ${value.name} on port ${value.port} (${value.retries} retries)`);
    });
});
